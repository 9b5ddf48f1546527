import { ConversationTurn } from './dto/chat.dto';

export const GROUNDING_RULES = `You are a strict, fact-checking question answering system for a school.

[Rules]
1. Base your answer only on the content of the attached documents (PDF).
2. Read the graphs, tables, maps and photos inside the documents as well and use them in your answer.
3. Do not guess or generalize. If the documents do not contain the information, say clearly that the information is not available in the documents.
4. Keep a polite, clear tone.
5. Name the file you relied on for each fact, and the page number where it can be determined.`;

export const DEFAULT_PERSONAS: Record<string, string> = {
    Student: 'You are answering a current student. Focus on daily school life: timetables, rules, events and procedures, and keep explanations short and concrete.',
    Prospective: 'You are answering a prospective student who is considering enrolling. Explain programs, admissions and what the school offers in a welcoming way.',
    Guardian: 'You are answering a parent or guardian. Focus on fees, safety, communication with the school and support for their child, in a respectful tone.',
};

export const QUESTION_PREFIX = '[User question]';

export const FALLBACK_MESSAGES = {
    blocked: 'I am sorry, but I cannot answer that question. Please rephrase it or ask about something else.',
    rateLimited: 'Sorry, the service is receiving too many requests right now (capacity limit). Please wait about a minute and try again.',
    failed: 'An error occurred while preparing the answer. Please try again later.',
} as const;

const SPEAKER_LABELS: Record<ConversationTurn['role'], string> = {
    user: 'User',
    assistant: 'Assistant',
};

/** Last `window` turns, oldest first. */
export function truncateHistory(history: readonly ConversationTurn[], window: number): ConversationTurn[] {
    if (window <= 0) return [];
    return history.slice(-window);
}

export function renderHistory(turns: readonly ConversationTurn[]): string {
    return turns.map(turn => `${SPEAKER_LABELS[turn.role]}: ${turn.text}`).join('\n');
}

export function buildInstruction(persona: string | undefined, historyBlock: string): string {
    const sections = [GROUNDING_RULES];
    if (persona) sections.push(`[Persona]\n${persona}`);
    sections.push(`[Conversation so far]\n${historyBlock}`);
    return sections.join('\n\n');
}

export function buildQuestion(question: string): string {
    return `${QUESTION_PREFIX}\n${question}`;
}
