export type MetadataValue = string | number | boolean;

/**
 * One metadata condition. `equals` matches a scalar payload value or one
 * element of an array payload value, `anyOf` matches when an array payload
 * value shares at least one element.
 */
export type MetadataCondition =
  | { key: string; equals: MetadataValue }
  | { key: string; anyOf: string[] };

export interface CompiledFilter {
  clause: string;
  values: unknown[];
}

/**
 * Compiles conditions into a parameterised SQL fragment over a jsonb
 * `metadata` column. Placeholders start at `$${firstIndex}`.
 */
export const compileFilter = (conditions: MetadataCondition[], firstIndex: number): CompiledFilter => {
  const clauses: string[] = [];
  const values: unknown[] = [];
  const next = (value: unknown): string => {
    values.push(value);
    return `$${firstIndex + values.length - 1}`;
  };

  for (const condition of conditions) {
    if ('anyOf' in condition) {
      if (condition.anyOf.length === 0) {
        continue;
      }
      clauses.push(`metadata -> ${next(condition.key)} ?| ${next(condition.anyOf)}::text[]`);
    } else {
      const scalar = `metadata ->> ${next(condition.key)} = ${next(String(condition.equals))}`;
      const element = `metadata -> ${next(condition.key)} @> ${next(JSON.stringify([condition.equals]))}::jsonb`;
      clauses.push(`(${scalar} OR ${element})`);
    }
  }

  return { clause: clauses.join(' AND '), values };
};

/**
 * Equality conditions for every defined entry; undefined and empty values are skipped.
 */
export const equalityConditions = (
  entries: Record<string, MetadataValue | undefined | null>
): MetadataCondition[] =>
  Object.entries(entries).flatMap(([key, value]) =>
    value === undefined || value === null || value === '' ? [] : [{ key, equals: value }]
  );
