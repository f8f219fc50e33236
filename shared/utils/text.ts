import { MAX_BULLET_CHARS, TRUNCATION_MARK } from '../constants';

/**
 * Strip Markdown emphasis and leading bullet characters the model tends to add.
 */
export const cleanText = (text: string): string => {
    return text.replace(/\*\*(.*?)\*\*/g, '$1') // Bold
        .replace(/\*(.*?)\*/g, '$1')     // Italic
        .replace(/__(.*?)__/g, '$1')     // Bold
        .replace(/`([^`]+)`/g, '$1')     // Code
        .replace(/^[\s\-\*•]+/, '')      // Leading dashes, asterisks, bullets
        .trim();
};

/**
 * Remove a trailing "Sources:" / "References:" block from speaker notes.
 */
export function cleanSpeakerNotes(notes: string): string {
    if (!notes) return '';
    return notes.replace(/(?:Sources|References|Citations):\s*[\s\S]*$/i, '').trim();
}

export function truncateText(text: string, budget = MAX_BULLET_CHARS): { text: string; truncated: boolean } {
    const chars = Array.from(text);
    if (chars.length <= budget) {
        return { text, truncated: false };
    }
    return {
        text: chars.slice(0, budget - 1).join('').trimEnd() + TRUNCATION_MARK,
        truncated: true,
    };
}
