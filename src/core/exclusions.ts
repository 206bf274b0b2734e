export type ExclusionResult = { ok: true; indices: number[] } | { ok: false; error: string };

// Parse "1, 3" into 0-based indices. Blank input excludes nobody.
export function parseExclusionInput(input: string, count: number): ExclusionResult {
  if (input.trim() === '') {
    return { ok: true, indices: [] };
  }

  const indices = new Set<number>();
  for (const raw of input.split(',')) {
    const token = raw.trim();
    if (token === '') continue;

    if (!/^\d+$/.test(token)) {
      return { ok: false, error: `Invalid input: ${token}` };
    }
    const number = parseInt(token, 10);
    if (number < 1 || number > count) {
      return { ok: false, error: `No person numbered ${number} (choose 1-${count})` };
    }
    indices.add(number - 1);
  }

  return { ok: true, indices: [...indices].sort((a, b) => a - b) };
}
