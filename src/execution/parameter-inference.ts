export type CandidatePostProcessor = (value: string, paramName: string) => string;

function afterSegment(segment: string): CandidatePostProcessor {
  return (value) => {
    const index = value.lastIndexOf(segment);
    return index === -1 ? value : value.slice(index + segment.length);
  };
}

function chain(...processors: CandidatePostProcessor[]): CandidatePostProcessor {
  return (value, paramName) => processors.reduce((current, processor) => processor(current, paramName), value);
}

/** Namespaces whose identifiers come embedded in resource paths. */
export const DEFAULT_POST_PROCESSORS: ReadonlyMap<string, CandidatePostProcessor> = new Map([
  ['route-53', chain(afterSegment('/hostedzone/'), afterSegment('/change/'))],
  ['cloudfront', afterSegment('distribution/')],
]);

/**
 * `BucketName` → `Name`, `QueueUrl` → `Url`. Null when the name is a single word.
 */
export function trailingNoun(paramName: string): string | null {
  const match = /[A-Z][a-z0-9]+$/.exec(paramName);
  if (!match || match.index === 0) return null;
  return match[0];
}

export function candidateFields(paramName: string): string[] {
  const fields = [
    paramName,
    `${paramName}Id`,
    `${paramName}_id`,
    'Id',
    'ID',
    'id',
    'Arn',
    'ARN',
    'arn',
  ];
  const noun = trailingNoun(paramName);
  if (noun && !fields.includes(noun)) fields.push(noun);
  return fields;
}

function readCandidate(item: Record<string, unknown>, fields: readonly string[]): string | null {
  for (const field of fields) {
    const value = item[field];
    if (typeof value === 'string' && value !== '') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return null;
}

/**
 * Distinct identifier values for `paramName`, read from cached list items
 * in order, at most `limit` of them.
 */
export function inferCandidates(
  items: readonly unknown[],
  paramName: string,
  namespace: string,
  limit: number,
  postProcessors: ReadonlyMap<string, CandidatePostProcessor> = DEFAULT_POST_PROCESSORS
): string[] {
  if (limit <= 0) return [];

  const fields = candidateFields(paramName);
  const postProcess = postProcessors.get(namespace);
  const seen = new Set<string>();

  for (const item of items) {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) continue;
    const raw = readCandidate(Object.fromEntries(Object.entries(item)), fields);
    if (raw === null) continue;

    const value = postProcess ? postProcess(raw, paramName) : raw;
    if (value === '' || seen.has(value)) continue;

    seen.add(value);
    if (seen.size >= limit) break;
  }

  return [...seen];
}
