/**
 * Division labels: A..Z, then AA, AB, ... like spreadsheet columns.
 */

export function divisionLetters(index: number): string {
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`Division index must be a non-negative integer, got ${index}`);
  }

  let letters = '';
  let n = index + 1;
  while (n > 0) {
    const remainder = (n - 1) % 26;
    letters = String.fromCharCode(65 + remainder) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export function divisionId(index: number): string {
  return `DIV-${divisionLetters(index)}`;
}

export function divisionName(index: number): string {
  return `Division ${divisionLetters(index)}`;
}
