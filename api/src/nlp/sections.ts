const MAX_HEADING_LENGTH = 60;

const NUMBERED = /^\d+\.(\d+\.?)*\s*\p{L}/u;
const DIVISION_WORDS = new Set(["chapter", "section", "part", "article", "appendix"]);
const DIVISION_LABEL = /^(?:\d+(?:\.\d+)*|[IVXLCDM]+|[A-Z])[.:]?$/;

const ALL_CAPS = /^[\p{Lu}\d\s\-–—:&,.'’()/]+$/u;
const LETTER = /\p{L}/gu;

function isNumberedHeading(line: string): boolean {
  if (NUMBERED.test(line)) {
    return true;
  }
  const [word, label] = line.split(/\s+/, 2);
  return DIVISION_WORDS.has(word.toLowerCase()) && label !== undefined && DIVISION_LABEL.test(label);
}

function isAllCapsHeading(line: string): boolean {
  return line.length >= 3 && ALL_CAPS.test(line) && (line.match(LETTER) ?? []).length >= 2;
}

/** "TERMS & CONDITIONS" → "Terms & Conditions". */
export function toTitleCase(line: string): string {
  return line.toLowerCase().replace(/(^|[^\p{L}\p{N}'’])(\p{L})/gu, (_, before: string, letter: string) => before + letter.toUpperCase());
}

/**
 * Heading-like lines in document order. Numbered headings ("2.1 Terms",
 * "Chapter IV") are kept as written; all-caps headings are title-cased.
 * Duplicates are dropped after the first occurrence.
 */
export function sections(text: string): string[] {
  const seen = new Set<string>();
  const headings: string[] = [];

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.length > MAX_HEADING_LENGTH) continue;

    let heading: string | null = null;
    if (isNumberedHeading(line)) {
      heading = line;
    } else if (isAllCapsHeading(line)) {
      heading = toTitleCase(line);
    }

    if (heading && !seen.has(heading)) {
      seen.add(heading);
      headings.push(heading);
    }
  }

  return headings;
}
