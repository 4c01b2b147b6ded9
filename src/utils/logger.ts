import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const DEFAULT_LOG_DIR = 'memory/logs';
const MAX_PAYLOAD_LENGTH = 2_000;

const SECRET_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
    { pattern: /\b(sk|gsk|pk|rk)[-_][A-Za-z0-9_-]{12,}\b/g, replacement: '[REDACTED_KEY]' },
    { pattern: /\bBearer\s+[A-Za-z0-9._~+/=-]{8,}/gi, replacement: 'Bearer [REDACTED]' },
    {
        pattern: /\b([A-Z][A-Z0-9_]*(?:KEY|TOKEN|SECRET|PASSWORD))\s*[=:]\s*("[^"]*"|'[^']*'|\S+)/g,
        replacement: '$1=[REDACTED]',
    },
];

function resolveLogDir(): string {
    return path.resolve(process.env.VOXLOOP_LOG_DIR ?? DEFAULT_LOG_DIR);
}

function dailyLogPath(now: Date): string {
    const day = now.toISOString().slice(0, 10);
    return path.join(resolveLogDir(), `${day}.md`);
}

function truncate(value: string): string {
    if (value.length <= MAX_PAYLOAD_LENGTH) {
        return value;
    }
    return `${value.slice(0, MAX_PAYLOAD_LENGTH)}...[truncated]`;
}

/** Redact API keys, bearer tokens and `NAME_KEY=value` pairs from free text. */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;
    for (const { pattern, replacement } of SECRET_PATTERNS) {
        scrubbed = scrubbed.replace(pattern, replacement);
    }
    return scrubbed;
}

async function appendEntry(entry: string): Promise<void> {
    const now = new Date();
    const line = `- ${now.toISOString()} ${scrubSensitiveText(entry)}\n`;
    try {
        await mkdir(resolveLogDir(), { recursive: true });
        await appendFile(dailyLogPath(now), line, 'utf8');
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Logger] Failed to append log entry: ${message}`);
    }
}

/**
 * Append an operational note to today's log file.
 *
 * Callers treat this as fire-and-forget (`void logThought(...)`); write failures are
 * reported on stderr and never rejected.
 */
export async function logThought(message: string): Promise<void> {
    await appendEntry(message);
}

/** Record one delegate invocation together with its (truncated) output. */
export async function logDelegateCall(
    delegateName: string,
    args: Record<string, unknown>,
    output: string,
): Promise<void> {
    await appendEntry(
        `[Delegate] ${delegateName} args=${truncate(JSON.stringify(args))} output=${truncate(output)}`,
    );
}

/** Record a subprocess launched by a delegate or a local backend. */
export async function logSystemCommand(command: string, output: string, exitCode: number): Promise<void> {
    await appendEntry(`[Command] \`${command}\` exit=${exitCode} output=${truncate(output)}`);
}
