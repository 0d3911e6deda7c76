import { z } from 'zod';
import { DEFAULT_INLINE_ARRAY_MAX_LENGTH } from './serializer/toonSerializer';
import { TABULAR_SYNTAX_TREE_SCAN_TIMEOUT_MS } from './toonModel/tabularRegions';

export const toonToolsConfigSchema = z.object({
    serializer: z
        .object({
            inlineArrayMaxLength: z.number().int().min(0).default(DEFAULT_INLINE_ARRAY_MAX_LENGTH),
        })
        .default({}),
    syntaxTree: z
        .object({
            timeoutMs: z.number().int().positive().default(TABULAR_SYNTAX_TREE_SCAN_TIMEOUT_MS),
        })
        .default({}),
    tokenCounter: z
        .object({
            enabled: z.boolean().default(false),
            debounceMs: z.number().int().min(0).default(500),
            format: z
                .string()
                .refine((value) => value.includes('%d'), { message: 'must contain %d' })
                .default('%d tokens'),
            countingFormat: z.string().default('... tokens'),
        })
        .default({}),
});

export type ToonToolsConfig = z.infer<typeof toonToolsConfigSchema>;
export type ToonToolsConfigInput = z.input<typeof toonToolsConfigSchema>;

export type ConfigResult = { ok: true; config: ToonToolsConfig } | { ok: false; error: string };

/**
 * Validates `overrides` and fills every missing setting with its default.
 * Reports the first invalid setting as `<path>: <message>`.
 */
export function resolveConfig(overrides: unknown = {}): ConfigResult {
    const parsed = toonToolsConfigSchema.safeParse(overrides);
    if (parsed.success) {
        return { ok: true, config: parsed.data };
    }

    const [issue] = parsed.error.issues;
    const path = issue.path.join('.');
    return { ok: false, error: path ? `${path}: ${issue.message}` : issue.message };
}

export const defaultConfig: ToonToolsConfig = toonToolsConfigSchema.parse({});
