export function idify(s: string): string {
  return s
    .toLowerCase()
    .replace(/&/g, 'and')
    .replace(/['.]/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');
}

export function roundPoints(value: number): number {
  return Number(value.toFixed(2));
}
