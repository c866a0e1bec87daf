const HTML_CODES: [string, string][] = [
  ['<=', '&leq;'],
  ['>=', '&geq;'],
];

/**
 * Replace comparison operators that a tree renderer would otherwise read as
 * markup with their HTML entities.
 */
export function htmlify(text: string): string {
  let out = text;
  for (const [plain, code] of HTML_CODES) {
    out = out.split(plain).join(code);
  }
  return out;
}

export function unhtmlify(text: string): string {
  let out = text;
  for (const [plain, code] of HTML_CODES) {
    out = out.split(code).join(plain);
  }
  return out;
}
