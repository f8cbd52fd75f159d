import { ConversationTurn, ScoredChunk, TutorPrompt } from '../../utils/types';

export const TUTOR_SYSTEM_PROMPT = `You are a patient, encouraging tutor helping a student learn from their course materials.

How to answer:
- Explain concepts clearly and accurately, at the student's level.
- Base your answer on the provided course material whenever it is available, and mention which source you used.
- If the material does not cover the question, say so and offer general guidance instead.
- Break complex ideas into smaller steps and use examples or analogies.
- Ask a clarifying question when the request is ambiguous.
- Keep a friendly, conversational tone and invite follow-up questions.

Your goal is to help the student understand, not only to hand over answers.`;

export const UNGROUNDED_INSTRUCTION = `No course material matched this question.
Tell the student that their uploaded materials do not seem to cover it, then give general guidance only.
Do not invent course-specific facts, quotes, page numbers or assessment details.`;

const CLOSING_INSTRUCTION =
    'Please give a helpful, educational answer to the question above. Use the course material when it is relevant and explain concepts clearly.';

export function buildContextBlock(results: ScoredChunk[]): string {
    return results
        .map(({ chunk }, i) => `Context ${i + 1} (from ${chunk.metadata.documentFilename}):\n${chunk.text}`)
        .join('\n\n');
}

/**
 * Retrieved chunks keep their ranking order; history is passed as separate
 * turns so the model sees real roles.
 */
export function buildTutorPrompt(question: string, results: ScoredChunk[], history: ConversationTurn[]): TutorPrompt {
    const grounded = results.length > 0;
    const parts = [
        grounded ? `Relevant course material:\n${buildContextBlock(results)}` : UNGROUNDED_INSTRUCTION,
        `Student's question: ${question}`,
        CLOSING_INSTRUCTION,
    ];
    return {
        system: TUTOR_SYSTEM_PROMPT,
        user: parts.join('\n\n'),
        history,
        grounded,
    };
}

const FALLBACK_OPENERS = [
    (q: string, info: string) => `Great question about "${q}"! ${info} Let me explain this concept based on what I know.`,
    (q: string, info: string) => `Excellent question! "${q}" is an important topic. ${info} Here's what I can tell you about it.`,
    (q: string, info: string) => `I'd be happy to help with "${q}". ${info} This is a fundamental concept worth understanding.`,
    (q: string, info: string) => `Interesting question about "${q}"! ${info} Let me break this down for you.`,
];

const FALLBACK_ENDINGS = [
    '\n\nThis concept is important because it forms the foundation for more advanced topics.',
    '\n\nUnderstanding this will help you with related concepts in your studies.',
    '\n\nThis topic often appears in exams and practical applications.',
    '\n\nMastering this concept will make future learning much easier.',
];

/** Deterministic answer used when the generation model cannot respond. */
export function fallbackAnswer(question: string, contextCount: number): string {
    const info = contextCount > 0
        ? `I found ${contextCount} relevant section${contextCount === 1 ? '' : 's'} in your course materials that address this topic.`
        : "I don't have specific information about this topic in your uploaded materials.";
    const i = question.length % FALLBACK_OPENERS.length;
    return FALLBACK_OPENERS[i](question, info) + FALLBACK_ENDINGS[i];
}

/** Groups words (with their trailing whitespace) so the fragments join back to the text. */
export function splitIntoFragments(text: string, wordsPerFragment = 3): string[] {
    const words = text.match(/\S+\s*/g) ?? [];
    const fragments: string[] = [];
    for (let i = 0; i < words.length; i += wordsPerFragment) {
        fragments.push(words.slice(i, i + wordsPerFragment).join(''));
    }
    return fragments;
}

const STARTER_SUGGESTIONS = [
    'Upload some course materials to get personalized learning suggestions!',
    'Ask me questions about any topic you are studying.',
    "Try asking 'Can you explain [topic]?' for a detailed explanation.",
];

export function learningSuggestions(history: ConversationTurn[]): string[] {
    const questions = history.filter(turn => turn.role === 'user');
    if (questions.length === 0) return [...STARTER_SUGGESTIONS];

    const latest = questions[questions.length - 1].content;
    return [
        `Based on your question "${latest}", you might want to explore related topics.`,
        'Consider reviewing the materials we discussed earlier.',
        'Try asking more specific questions about the topics you are interested in.',
    ];
}
