import fs from "node:fs/promises";
import path from "node:path";

export const DEFAULT_API_URL = "http://localhost:8080";

const ASSIGNMENT = /^(?:export\s+)?([A-Za-z_]\w*)\s*=\s*(.*)$/;

const DOUBLE_QUOTED_ESCAPES: Record<string, string> = { n: "\n", r: "\r", t: "\t", '"': '"' };

/**
 * Double-quoted values expand \n, \r, \t and \"; single-quoted values are
 * literal; bare values end at " #".
 */
function unquote(raw: string): string {
  const value = raw.trim();
  const quote = value[0];

  if (value.length >= 2 && (quote === '"' || quote === "'") && value.endsWith(quote)) {
    const inner = value.slice(1, -1);
    return quote === "'" ? inner : inner.replace(/\\([nrt"])/g, (_, ch: string) => DOUBLE_QUOTED_ESCAPES[ch]);
  }

  const comment = value.indexOf(" #");
  return (comment === -1 ? value : value.slice(0, comment)).trim();
}

async function readIfExists(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Copies KEY=value pairs from `<cwd>/.env` into process.env. Variables that
 * are already set win.
 */
export async function loadDotEnvFromCwd(cwd: string = process.cwd()): Promise<void> {
  const content = await readIfExists(path.join(cwd, ".env"));
  if (content === null) {
    return;
  }

  for (const line of content.split(/\r?\n/)) {
    const match = ASSIGNMENT.exec(line.trim());
    if (!match || process.env[match[1]] !== undefined) {
      continue;
    }
    process.env[match[1]] = unquote(match[2]);
  }
}

export function getDefaultApiUrl(): string {
  const explicit = (process.env.DOCMETA_URL || "").trim();
  return explicit ? explicit.replace(/\/+$/, "") : DEFAULT_API_URL;
}
