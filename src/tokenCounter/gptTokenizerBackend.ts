import { encode } from 'gpt-tokenizer';
import type { TokenCountBackend } from './tokenCounterSession';

/**
 * Counts GPT tokens in process with `gpt-tokenizer`.
 */
export function createGptTokenizerBackend(): TokenCountBackend {
    return {
        count: async (text, signal) => {
            if (signal.aborted) {
                throw new Error('Token count cancelled');
            }
            return encode(text).length;
        },
    };
}
