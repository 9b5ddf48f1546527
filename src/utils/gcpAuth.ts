import fs from 'node:fs';
import { GoogleAuth } from 'google-auth-library';

export const GOOGLE_SCOPES = [
    'https://www.googleapis.com/auth/drive.readonly',
    'https://www.googleapis.com/auth/spreadsheets',
];

export class CredentialsUnavailableError extends Error {
    constructor(readonly searched: string[]) {
        super(`No service account key found (looked in: ${searched.join(', ')})`);
        this.name = 'CredentialsUnavailableError';
    }
}

export function resolveKeyFile(candidates: string[]): string | undefined {
    return candidates.find(candidate => fs.existsSync(candidate));
}

export function createGoogleAuth(candidates: string[], scopes: string[] = GOOGLE_SCOPES): GoogleAuth {
    const keyFile = resolveKeyFile(candidates);
    if (!keyFile) throw new CredentialsUnavailableError(candidates);
    return new GoogleAuth({ keyFile, scopes });
}
