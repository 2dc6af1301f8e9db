// ============================================================================
// CLI helpers shared by the scripts
// ============================================================================

import readline from 'readline/promises';
import { ApiError, ClientError } from '../errors.js';
import { describeGraphError } from '../services/instagram-graph.service.js';

export const RULE = '='.repeat(70);

export function banner(title: string): void {
    console.log(`\n${RULE}\n${title}\n${RULE}`);
}

/**
 * Runs a script body and sets the exit code: 0 on success (or the number it
 * returns), 1 on any error.
 */
export function runMain(main: () => Promise<number | void>): void {
    void main()
        .then(code => {
            process.exitCode = code ?? 0;
        })
        .catch((error: unknown) => {
            if (error instanceof ApiError) {
                console.error(`❌ ${error.message}`);
                if (error.bodyText) console.error(`   Response: ${error.bodyText.slice(0, 500)}`);
                for (const line of describeGraphError(error.code)) console.error(`💡 ${line}`);
            } else if (error instanceof ClientError) {
                console.error(`❌ ${error.message}`);
            } else {
                console.error('❌ Unexpected error:', error);
            }
            process.exitCode = 1;
        });
}

export async function prompt(question: string): Promise<string> {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
        return (await rl.question(question)).trim();
    } finally {
        rl.close();
    }
}

export function truncate(text: string, length: number): string {
    return text.length > length ? `${text.slice(0, length)}...` : text;
}
