/**
 * Loose dotted-version comparison ("2.40.0", "10.0.1", "7.4")
 *
 * Non-numeric segments compare as 0, missing segments as 0.
 * Returns a negative number when a < b, positive when a > b.
 */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map(part => parseInt(part, 10) || 0);
  const right = b.split('.').map(part => parseInt(part, 10) || 0);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

export function highestVersion(versions: string[]): string | undefined {
  return [...versions].sort(compareVersions).pop();
}
