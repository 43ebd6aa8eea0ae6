import fs from "fs";
import readline from "readline";

export interface JSONLOptions<T> {
    guard: (value: unknown) => value is T;
    filter?: (value: T) => boolean;
    limit?: number;
}

/**
 * Stream a JSON Lines file. Blank, unparseable and guard-rejected lines
 * are skipped; a torn final line after a crash is therefore ignored.
 */
export async function readJSONL<T>(filePath: string, options: JSONLOptions<T>): Promise<T[]> {
    if (!fs.existsSync(filePath)) {
        return [];
    }

    const results: T[] = [];
    const fileStream = fs.createReadStream(filePath);
    const rl = readline.createInterface({
        input: fileStream,
        crlfDelay: Infinity
    });

    try {
        for await (const line of rl) {
            if (!line.trim()) continue;

            let parsed: unknown;
            try {
                parsed = JSON.parse(line);
            } catch {
                console.warn(`[JSONL] Skipping unparseable line in ${filePath}`);
                continue;
            }

            if (options.guard(parsed) && (!options.filter || options.filter(parsed))) {
                results.push(parsed);
            }
            if (options.limit && results.length >= options.limit) {
                break;
            }
        }
    } finally {
        rl.close();
        fileStream.destroy();
    }

    return results;
}
