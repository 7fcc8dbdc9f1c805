/**
 * Name-similarity scoring used to break ties between candidate methods
 */

/**
 * Score in [0, 1] of how well a candidate method name fits the name of the
 * target property; higher is better.
 */
export type NameSimilarity = (
  candidateName: string,
  targetPropertyName: string
) => number;

const MAPPING_VERBS = ["map", "to", "convert", "as", "from"];

export const levenshteinDistance = (a: string, b: string): number => {
  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution =
        (previous[j - 1] ?? 0) + (a[i - 1] === b[j - 1] ? 0 : 1);
      const insertion = (current[j - 1] ?? 0) + 1;
      const deletion = (previous[j] ?? 0) + 1;
      current.push(Math.min(substitution, insertion, deletion));
    }
    previous = current;
  }

  return previous[b.length] ?? 0;
};

/**
 * Drop a leading mapping verb: `toUpperCase` is compared as `uppercase`.
 * The verb must end at a word boundary, so `totalPrice` keeps its `to`.
 */
export const stripMappingVerb = (name: string): string => {
  const verb = MAPPING_VERBS.find(
    (v) => name.startsWith(v) && /[A-Z]/.test(name.charAt(v.length))
  );
  return (verb ? name.slice(verb.length) : name).toLowerCase();
};

export const levenshteinSimilarity: NameSimilarity = (
  candidateName,
  targetPropertyName
) => {
  const a = stripMappingVerb(candidateName);
  const b = targetPropertyName.toLowerCase();
  const longest = Math.max(a.length, b.length);
  return longest === 0 ? 1 : 1 - levenshteinDistance(a, b) / longest;
};
