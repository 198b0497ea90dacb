/** XOR of every character code, as used by the `^HH` suffix. */
export function xorChecksum(text: string): number {
  let sum = 0;
  for (let i = 0; i < text.length; i++) {
    sum ^= text.charCodeAt(i) & 0xff;
  }
  return sum;
}

export function appendChecksum(text: string): string {
  return `${text}^${toHex(xorChecksum(text), 2)}`;
}

export type ChecksumCheck =
  | { present: false; body: string }
  | { present: true; valid: boolean; body: string };

/** Splits an optional `^HH` suffix off a line and verifies it. */
export function stripChecksum(line: string): ChecksumCheck {
  const caret = line.lastIndexOf("^");
  if (caret === -1) {
    return { present: false, body: line };
  }
  const body = line.slice(0, caret);
  const digits = line.slice(caret + 1);
  if (!/^[0-9A-Fa-f]{2}$/.test(digits)) {
    return { present: true, valid: false, body };
  }
  return { present: true, valid: parseInt(digits, 16) === xorChecksum(body), body };
}

export function toHex(value: number, width: number): string {
  return value.toString(16).toUpperCase().padStart(width, "0");
}
