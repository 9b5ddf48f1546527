import { registerAs } from '@nestjs/config';
import fs from 'node:fs';
import os from 'node:os';
import { z } from 'zod';

const envSchema = z.object({
    DRIVE_ROOT_FOLDER_ID: z.string().trim().default(''),
    ROLE_TAGS: z.string().default('Student,Prospective,Guardian'),
    INGEST_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(2000),
    INGEST_POLL_MAX_ATTEMPTS: z.coerce.number().int().positive().default(30),
    CHAT_HISTORY_WINDOW: z.coerce.number().int().nonnegative().default(4),
    SYNC_ON_STARTUP: z.enum(['true', 'false']).default('true'),
    STAGING_DIR: z.string().optional(),
    PERSONAS_FILE: z.string().optional(),
});

const personasSchema = z.record(z.string(), z.string());

export interface KnowledgeSettings {
    rootFolderId: string;
    roleTags: string[];
    pollIntervalMs: number;
    pollMaxAttempts: number;
    historyWindow: number;
    syncOnStartup: boolean;
    stagingDir: string;
    /** role -> persona text; merged over the built-in personas */
    personas: Record<string, string>;
}

export function parseRoleTags(raw: string): string[] {
    const seen = new Set<string>();
    for (const tag of raw.split(',')) {
        const trimmed = tag.trim();
        if (trimmed) seen.add(trimmed);
    }
    return [...seen];
}

function loadPersonas(file?: string): Record<string, string> {
    if (!file) return {};
    const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    return personasSchema.parse(raw);
}

export function buildKnowledgeSettings(env: NodeJS.ProcessEnv): KnowledgeSettings {
    const parsed = envSchema.parse(env);
    return {
        rootFolderId: parsed.DRIVE_ROOT_FOLDER_ID,
        roleTags: parseRoleTags(parsed.ROLE_TAGS),
        pollIntervalMs: parsed.INGEST_POLL_INTERVAL_MS,
        pollMaxAttempts: parsed.INGEST_POLL_MAX_ATTEMPTS,
        historyWindow: parsed.CHAT_HISTORY_WINDOW,
        syncOnStartup: parsed.SYNC_ON_STARTUP === 'true',
        stagingDir: parsed.STAGING_DIR || os.tmpdir(),
        personas: loadPersonas(parsed.PERSONAS_FILE),
    };
}

export const knowledgeConfig = registerAs('knowledge', (): KnowledgeSettings => buildKnowledgeSettings(process.env));
