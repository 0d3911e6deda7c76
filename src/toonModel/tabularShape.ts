import { isScalar, type StructuredMapping, type StructuredValue } from './types';

/**
 * `isTabular`: every item is a mapping and all items share one non-empty key set.
 * `isFlat`: tabular, and every value in every row is a scalar.
 */
export type TabularShape =
    | { isTabular: false; isFlat: false }
    | {
          isTabular: true;
          /** Shared keys, sorted ascending. */
          fields: string[];
          rows: StructuredMapping[];
          isFlat: boolean;
      };

const NOT_TABULAR: TabularShape = { isTabular: false, isFlat: false };

function sortedKeys(mapping: StructuredMapping): string[] {
    return [...mapping.entries.keys()].sort(compareKeys);
}

function compareKeys(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

function sameKeys(a: string[], b: string[]): boolean {
    return a.length === b.length && a.every((key, i) => key === b[i]);
}

export function analyzeTabular(items: readonly StructuredValue[]): TabularShape {
    if (items.length === 0) {
        return NOT_TABULAR;
    }

    let fields: string[] | null = null;
    const mappings: StructuredMapping[] = [];

    for (const item of items) {
        if (item.kind !== 'mapping') {
            return NOT_TABULAR;
        }
        const keys = sortedKeys(item);
        if (fields === null) {
            fields = keys;
        } else if (!sameKeys(fields, keys)) {
            return NOT_TABULAR;
        }
        mappings.push(item);
    }

    // Rows of empty mappings would have nothing to print.
    if (fields === null || fields.length === 0) {
        return NOT_TABULAR;
    }

    const shared = fields;
    const isFlat = mappings.every((mapping) =>
        shared.every((field) => {
            const value = mapping.entries.get(field);
            return value !== undefined && isScalar(value);
        })
    );

    return { isTabular: true, fields: shared, rows: mappings, isFlat };
}
