/**
 * Calculate similarity between two names using edit distance and shared words.
 * Returns a value between 0 (completely different) and 1 (identical)
 */
export function calculateStringSimilarity(str1: string, str2: string): number {
  const s1 = normalizeString(str1);
  const s2 = normalizeString(str2);

  if (s1.length === 0 && s2.length === 0) {
    return 1;
  }

  const levenshteinSimilarity = calculateLevenshteinSimilarity(s1, s2);
  const wordSetSimilarity = calculateWordSetSimilarity(s1, s2);

  // Airport names often differ only by an extra word ("Airport", "International")
  return levenshteinSimilarity * 0.4 + wordSetSimilarity * 0.6;
}

export function normalizeString(str: string): string {
  return str
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')  // Strip accents
    .toLowerCase()
    .replace(/[^\w\s]/g, ' ')  // Replace punctuation with spaces
    .replace(/\s+/g, ' ')      // Normalize spaces
    .trim();
}

function calculateLevenshteinSimilarity(s1: string, s2: string): number {
  const costs: number[] = [];
  for (let i = 0; i <= s1.length; i++) {
    let lastValue = i;
    for (let j = 0; j <= s2.length; j++) {
      if (i === 0) {
        costs[j] = j;
      } else if (j > 0) {
        let newValue = costs[j - 1];
        if (s1.charAt(i - 1) !== s2.charAt(j - 1)) {
          newValue = Math.min(
            Math.min(newValue, lastValue),
            costs[j]
          ) + 1;
        }
        costs[j - 1] = lastValue;
        lastValue = newValue;
      }
    }
    if (i > 0) {
      costs[s2.length] = lastValue;
    }
  }

  const levenshteinDistance = costs[s2.length];
  const maxLength = Math.max(s1.length, s2.length);
  return 1 - (levenshteinDistance / maxLength);
}

function calculateWordSetSimilarity(s1: string, s2: string): number {
  const words1 = new Set(s1.split(' ').filter(Boolean));
  const words2 = new Set(s2.split(' ').filter(Boolean));

  const intersection = [...words1].filter(x => words2.has(x));
  const union = new Set([...words1, ...words2]);

  return union.size === 0 ? 0 : intersection.length / union.size;
}
