import { DocumentHandle, HandleState } from '../knowledge/types';

export interface SubmitDocumentInput {
    path: string;
    displayName: string;
    mimeType: string;
}

export type GenerationPart =
    | { kind: 'text'; text: string }
    | { kind: 'document'; handle: DocumentHandle };

export type GenerationOutcome =
    | { kind: 'text'; text: string }
    | { kind: 'blocked'; reason: string };

/**
 * Document ingestion and content generation. `generate` throws
 * GenerationCallError for anything that is not text or a safety block.
 */
export abstract class GenerationClient {
    abstract submitDocument(input: SubmitDocumentInput): Promise<DocumentHandle>;
    abstract getHandleState(handle: DocumentHandle): Promise<HandleState>;
    /** Deletes the remote copy; the handle must not be used afterwards. */
    abstract releaseDocument(handle: DocumentHandle): Promise<void>;
    abstract generate(parts: GenerationPart[]): Promise<GenerationOutcome>;
}
