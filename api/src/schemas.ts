export const metadataSchema = {
  body: {
    type: "object" as const,
    required: ["filename", "content"],
    additionalProperties: false,
    properties: {
      filename: { type: "string" as const, minLength: 1, pattern: "\\S" },
      content: { type: "string" as const, pattern: "^[A-Za-z0-9+/\\r\\n]*={0,2}\\s*$" },
      declaredType: { type: "string" as const, minLength: 1 },
      maxKeywords: { type: "integer" as const, minimum: 0 },
      maxSummarySentences: { type: "integer" as const, minimum: 0 },
    },
  },
};

export interface MetadataRequestBody {
  filename: string;
  content: string;
  declaredType?: string;
  maxKeywords?: number;
  maxSummarySentences?: number;
}
