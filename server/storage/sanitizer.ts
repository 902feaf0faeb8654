export interface NameSanitizerOptions {
  whitelist: string;
  maxLength: number;
}

export interface NameSanitizer {
  /** Directory and archive names: drops trailing dots as well as surrounding spaces. */
  sanitizeName(raw: string): string;
  /** Uploaded file names: surrounding spaces only, so extensions survive. */
  sanitizeUploadName(raw: string): string;
}

function trimLeadingSpaces(chars: string[]): string[] {
  let start = 0;
  while (start < chars.length && chars[start] === " ") {
    start += 1;
  }
  return chars.slice(start);
}

function trimTrailing(chars: string[], strip: ReadonlySet<string>): string[] {
  let end = chars.length;
  while (end > 0 && strip.has(chars[end - 1] ?? "")) {
    end -= 1;
  }
  return chars.slice(0, end);
}

// Overlong names keep their tail, so the extension survives truncation.
function keepTail(chars: string[], maxLength: number): string[] {
  return chars.length > maxLength ? chars.slice(chars.length - maxLength) : chars;
}

const spaceOnly: ReadonlySet<string> = new Set([" "]);
const spaceAndDot: ReadonlySet<string> = new Set([" ", "."]);

export function createNameSanitizer(options: NameSanitizerOptions): NameSanitizer {
  const allowed = new Set(Array.from(options.whitelist));
  const maxLength = Math.max(1, Math.trunc(options.maxLength));

  const sanitize = (raw: string, trailing: ReadonlySet<string>): string => {
    const kept = Array.from(raw).filter((char) => allowed.has(char));
    const trimmed = trimTrailing(trimLeadingSpaces(kept), trailing);
    // Cutting the head can expose a leading space again.
    return trimLeadingSpaces(keepTail(trimmed, maxLength)).join("");
  };

  return {
    sanitizeName: (raw) => sanitize(raw, spaceAndDot),
    sanitizeUploadName: (raw) => sanitize(raw, spaceOnly)
  };
}
