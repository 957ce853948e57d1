// Index is the stored player_color code.
export const PLAYER_COLORS = [
  'Red',
  'Blue',
  'Green',
  'Pink',
  'Orange',
  'Yellow',
  'Black',
  'White',
  'Purple',
  'Brown',
  'Cyan',
  'Lime',
  'Maroon',
  'Rose',
  'Banana',
  'Gray',
  'Tan',
  'Coral',
] as const;

export function colorName(code: number): string {
  return PLAYER_COLORS[code] ?? `Color ${code}`;
}
