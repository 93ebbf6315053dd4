const WORD_REGEX = /[\p{L}\p{N}']+/gu;

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function tokenize(text: string): string[] {
  const lower = text.toLowerCase().replace(/\u2019/g, "'");
  const words = lower.match(WORD_REGEX) ?? [];
  return words
    .map((word) => word.replace(/^'+|'+$/g, "").replace(/'s$/, ""))
    .filter((word) => word.length > 0);
}

export function toTitleCase(text: string): string {
  return collapseWhitespace(text)
    .split(" ")
    .map((word) =>
      word.length === 0 ? word : word[0].toUpperCase() + word.slice(1).toLowerCase(),
    )
    .join(" ");
}
