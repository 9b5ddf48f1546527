export interface ChatLogEntry {
    timestamp: Date;
    role: string;
    question: string;
    answer: string;
}

/** Append-only record of answered questions. */
export abstract class ChatLogSink {
    abstract append(entry: ChatLogEntry): Promise<void>;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** `YYYY-MM-DD HH:MM:SS` in server local time. */
export function formatTimestamp(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function toRow(entry: ChatLogEntry): string[] {
    return [formatTimestamp(entry.timestamp), entry.role, entry.question, entry.answer];
}
