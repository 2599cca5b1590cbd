/**
 * Label column for the walkthrough's "→ label  value" lines.
 */

export const LABEL_WIDTH = 18;

/**
 * Pad a label to the column width, keeping at least two spaces before the
 * value when the label is longer than the column.
 */
export function labelCell(label: string): string {
  return label.padEnd(Math.max(LABEL_WIDTH, label.length + 2));
}
