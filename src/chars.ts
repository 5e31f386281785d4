// Character classes. The scanner works on single code points as strings;
// "" stands for end of input.

export function isZ(ch: string): boolean {
  return ch === "";
}

export function isBreak(ch: string): boolean {
  return ch === "\n" || ch === "\r";
}

export function isBreakZ(ch: string): boolean {
  return isBreak(ch) || isZ(ch);
}

export function isBlank(ch: string): boolean {
  return ch === " " || ch === "\t";
}

export function isBlankOrBreakZ(ch: string): boolean {
  return isBlank(ch) || isBreakZ(ch);
}

export function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9" && ch.length === 1;
}

/** `[0-9A-Za-z_-]` */
export function isAlpha(ch: string): boolean {
  return /^[0-9A-Za-z_-]$/.test(ch);
}

export function isHex(ch: string): boolean {
  return /^[0-9A-Fa-f]$/.test(ch);
}

/** Flow indicators `,[]{}` */
export function isFlow(ch: string): boolean {
  return ch === "," || ch === "[" || ch === "]" || ch === "{" || ch === "}";
}

export function isBom(ch: string): boolean {
  return ch === "\uFEFF";
}

function isNonSpace(ch: string): boolean {
  return !isZ(ch) && !isBreak(ch) && !isBom(ch) && !isBlank(ch);
}

export function isAnchorChar(ch: string): boolean {
  return isNonSpace(ch) && !isFlow(ch);
}

function isWordChar(ch: string): boolean {
  return isAlpha(ch) && ch !== "_";
}

export function isUriChar(ch: string): boolean {
  return isWordChar(ch) || (ch.length === 1 && "#;/?:@&=+$,_.!~*'()[]%".includes(ch));
}

export function isTagChar(ch: string): boolean {
  return isUriChar(ch) && !isFlow(ch) && ch !== "!";
}

/** Number of bytes the code point takes in UTF-8 */
export function utf8Length(ch: string): number {
  const code = ch.codePointAt(0) ?? 0;
  if (code < 0x80) return 1;
  if (code < 0x800) return 2;
  if (code < 0x10000) return 3;
  return 4;
}
