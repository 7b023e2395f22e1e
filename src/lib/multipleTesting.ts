/**
 * Multiple-testing corrections for batch results. Null p-values pass through
 * unchanged and do not count towards the number of tests.
 */

export function bonferroni(pValues: ReadonlyArray<number | null>): Array<number | null> {
  const nTests = pValues.filter(p => p !== null).length;
  return pValues.map(p => (p === null ? null : Math.min(1, p * nTests)));
}

/**
 * Benjamini-Hochberg false discovery rate (step-up procedure)
 */
export function benjaminiHochberg(pValues: ReadonlyArray<number | null>): Array<number | null> {
  const ranked: Array<{ index: number; p: number }> = [];
  pValues.forEach((p, index) => {
    if (p !== null) ranked.push({ index, p });
  });
  ranked.sort((a, b) => a.p - b.p);

  const nTests = ranked.length;
  const adjusted: Array<number | null> = pValues.map(() => null);

  // Ensure FDR is monotonic, walking down from the largest p-value
  let running = 1;
  for (let i = nTests - 1; i >= 0; i--) {
    const rank = i + 1;
    running = Math.min(running, (ranked[i].p * nTests) / rank);
    adjusted[ranked[i].index] = running;
  }

  return adjusted;
}
