import { registerAs } from '@nestjs/config';
import { z } from 'zod';

const envSchema = z.object({
    GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
    GEMINI_API_KEY: z.string().default(''),
    GEMINI_CHAT_MODEL: z.string().default('gemini-2.5-flash-lite'),
    GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    GEMINI_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(8192),
    LOG_SPREADSHEET_ID: z.string().optional(),
    LOG_SHEET_RANGE: z.string().default('A1'),
});

export const DEFAULT_CREDENTIAL_PATHS = ['/etc/secrets/credentials.json', 'credentials.json'];

export interface GoogleSettings {
    /** key files tried in order; the first one that exists wins */
    credentialPaths: string[];
    geminiApiKey: string;
    chatModel: string;
    generation: {
        temperature: number;
        topP: number;
        topK: number;
        maxOutputTokens: number;
    };
    logSpreadsheetId?: string;
    logSheetRange: string;
}

export function buildGoogleSettings(env: NodeJS.ProcessEnv): GoogleSettings {
    const parsed = envSchema.parse(env);
    return {
        credentialPaths: parsed.GOOGLE_APPLICATION_CREDENTIALS
            ? [parsed.GOOGLE_APPLICATION_CREDENTIALS, ...DEFAULT_CREDENTIAL_PATHS]
            : DEFAULT_CREDENTIAL_PATHS,
        geminiApiKey: parsed.GEMINI_API_KEY,
        chatModel: parsed.GEMINI_CHAT_MODEL,
        generation: {
            temperature: parsed.GEMINI_TEMPERATURE,
            topP: 0.95,
            topK: 40,
            maxOutputTokens: parsed.GEMINI_MAX_OUTPUT_TOKENS,
        },
        logSpreadsheetId: parsed.LOG_SPREADSHEET_ID || undefined,
        logSheetRange: parsed.LOG_SHEET_RANGE,
    };
}

export const googleConfig = registerAs('google', (): GoogleSettings => buildGoogleSettings(process.env));
