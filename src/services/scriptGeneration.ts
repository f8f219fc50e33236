import { buildScriptSystemPrompt, buildScriptUserPrompt } from '@shared/promptBuilders';
import { CancelledError, GenerationError, ValidationError } from '@shared/errors';
import type { ScriptEntry, ScriptParseResult, ScriptReport } from '@shared/types';
import { describeError, getErrorMessage } from '@shared/utils/errorMessage';
import { extractFirstJsonArray, retryWithBackoff, type RetryOptions } from '@shared/utils/retryLogic';
import { cleanSpeakerNotes, cleanText } from '@shared/utils/text';
import { getErrorStatus, isRecord } from '@shared/utils/typeGuards';
import { validateSlideCount, validateTopic } from '@shared/utils/validation';
import type { TextGenerator } from '../utils/geminiClient';

export function placeholderTitle(topic: string, index: number): string {
    return `${topic} (${index + 1})`;
}

function toStringList(value: unknown): string[] {
    if (Array.isArray(value)) {
        return value
            .filter(item => item !== null && item !== undefined)
            .map(item => cleanText(String(item)))
            .filter(Boolean);
    }
    if (typeof value === 'string' && value.trim()) {
        return [cleanText(value)];
    }
    return [];
}

function normalizeEntry(raw: unknown, index: number, topic: string, warnings: string[]): ScriptEntry {
    if (!isRecord(raw)) {
        warnings.push(`Slide ${index + 1}: script entry was not an object; used a placeholder`);
        return { title: placeholderTitle(topic, index), bullets: [] };
    }

    let title = typeof raw.title === 'string' ? cleanText(raw.title) : '';
    if (!title) {
        title = placeholderTitle(topic, index);
        warnings.push(`Slide ${index + 1}: script entry had no title; used "${title}"`);
    }

    const notesSource = typeof raw.notes === 'string' ? raw.notes : typeof raw.speakerNotes === 'string' ? raw.speakerNotes : '';
    const notes = cleanSpeakerNotes(notesSource);

    return {
        title,
        bullets: toStringList(raw.bullets ?? raw.content),
        ...(notes ? { notes } : {}),
    };
}

/**
 * Parse free-form model output into exactly `slideCount` entries.
 * Shortfalls are padded, extras truncated; only output with no JSON array at all is invalid.
 */
export function parseScript(text: string, slideCount: number, topic: string): ScriptParseResult {
    let items: unknown[];
    try {
        items = extractFirstJsonArray(text);
    } catch (error) {
        return { kind: 'invalid', reason: getErrorMessage(error) };
    }

    const warnings: string[] = [];
    if (items.length > slideCount) {
        console.warn(`[SCRIPT] Model returned ${items.length} slides, truncating to ${slideCount}`);
    }

    const entries = items.slice(0, slideCount).map((item, i) => normalizeEntry(item, i, topic, warnings));
    const missing = slideCount - entries.length;
    if (missing === 0) {
        return { kind: 'complete', entries, warnings };
    }

    for (let i = entries.length; i < slideCount; i++) {
        entries.push({ title: placeholderTitle(topic, i), bullets: [] });
    }
    warnings.push(`Script returned ${slideCount - missing} of ${slideCount} slides; padded the rest with placeholders`);
    return { kind: 'shortfall', entries, missing, warnings };
}

function toGenerationError(error: unknown): GenerationError {
    if (error instanceof GenerationError) return error;
    const status = getErrorStatus(error);
    if (status === 401 || status === 403) {
        return new GenerationError('Text generation rejected the credentials', 'AUTH', false, error);
    }
    if (status === 429) {
        return new GenerationError('Text generation is rate limited', 'RATE_LIMIT', true, error);
    }
    return new GenerationError(`Text generation failed: ${getErrorMessage(error)}`, 'API_ERROR', false, error);
}

export type ScriptRetryOptions = Omit<RetryOptions, 'signal' | 'label'>;

export class ScriptGenerator {
    constructor(private readonly textGenerator: TextGenerator, private readonly retryOptions: ScriptRetryOptions = {}) {}

    async generate(topic: string, slideCount: number, tone: string, signal?: AbortSignal): Promise<ScriptEntry[]> {
        const report = await this.generateWithReport(topic, slideCount, tone, signal);
        return report.entries;
    }

    async generateWithReport(topic: string, slideCount: number, tone: string, signal?: AbortSignal): Promise<ScriptReport> {
        const errors: string[] = [];
        validateTopic(topic, errors);
        validateSlideCount(slideCount, errors);
        if (errors.length > 0) {
            throw new ValidationError(`Invalid script request: ${errors.join('; ')}`, errors);
        }

        const cleanTopic = topic.trim();
        const prompt = {
            system: buildScriptSystemPrompt(),
            user: buildScriptUserPrompt(cleanTopic, slideCount, tone.trim() || 'neutral'),
        };

        const generateFn = async (attemptSignal: AbortSignal): Promise<ScriptReport> => {
            const text = await this.textGenerator.generate(prompt, attemptSignal);
            const parsed = parseScript(text, slideCount, cleanTopic);
            if (parsed.kind === 'invalid') {
                // Unusable output: ask again rather than composing from nothing
                throw new GenerationError(`Model returned no usable script: ${parsed.reason}`, 'INVALID_RESPONSE', true);
            }
            return { entries: parsed.entries, warnings: parsed.warnings };
        };

        try {
            const report = await retryWithBackoff(generateFn, { ...this.retryOptions, signal, label: 'Script generation' });
            console.log(`[SCRIPT] Generated ${report.entries.length} slides for "${cleanTopic}"`);
            return report;
        } catch (error: unknown) {
            if (error instanceof CancelledError) throw error;
            const failure = toGenerationError(error);
            console.error(`[SCRIPT] Giving up on "${cleanTopic}": ${describeError(failure)}`);
            throw failure;
        }
    }
}
