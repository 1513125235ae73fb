import fs from 'fs';
import path from 'path';
import { format } from 'util';

type ConsoleMethod = 'log' | 'error' | 'warn' | 'info' | 'debug';

const CONSOLE_METHODS: ConsoleMethod[] = ['log', 'error', 'warn', 'info', 'debug'];

/**
 * Tee every console call into `<log_dir>/<file_name>` with timestamp and level.
 *
 * @returns Function restoring the original console methods and closing the file
 */
export function setupFileLogging(
    log_dir: string = path.join(process.cwd(), 'logs'),
    file_name = 'index.log'
): () => Promise<void> {
    if (!fs.existsSync(log_dir)) fs.mkdirSync(log_dir, { recursive: true });

    const log_stream = fs.createWriteStream(path.join(log_dir, file_name), { flags: 'a' });
    const originals = new Map<ConsoleMethod, (...args: unknown[]) => void>();

    for (const method of CONSOLE_METHODS) {
        const original = console[method];
        originals.set(method, original);
        console[method] = (...args: unknown[]) => {
            const timestamp = new Date().toISOString();
            log_stream.write(`[${timestamp}] [${method.toUpperCase()}] ${format(...args)}\n`);
            original.apply(console, args);
        };
    }

    return () => new Promise<void>((resolve) => {
        for (const [method, original] of originals) {
            console[method] = original;
        }
        log_stream.end(() => resolve());
    });
}
