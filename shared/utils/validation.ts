import {
    DEFAULT_IMAGES_PER_SLIDE,
    DEFAULT_NUM_SLIDES,
    DEFAULT_TONE,
    MAX_IMAGES_PER_SLIDE,
    MAX_SLIDES,
    MAX_TOPIC_LENGTH,
} from '../constants';
import { ValidationError } from '../errors';
import type { GenerationRequest, ImageAsset, ScriptEntry } from '../types';
import { isRecord } from './typeGuards';

function checkInteger(value: unknown, name: string, min: number, max: number, errors: string[]): void {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
        errors.push(`'${name}' must be an integer`);
    } else if (value < min || value > max) {
        errors.push(`'${name}' must be between ${min} and ${max}`);
    }
}

export function validateTopic(topic: unknown, errors: string[]): void {
    if (typeof topic !== 'string' || !topic.trim()) {
        errors.push("'topic' must be a non-empty string");
    } else if (topic.trim().length > MAX_TOPIC_LENGTH) {
        errors.push(`'topic' must be at most ${MAX_TOPIC_LENGTH} characters`);
    }
}

export function validateSlideCount(slideCount: unknown, errors: string[]): void {
    checkInteger(slideCount, 'slide_count', 1, MAX_SLIDES, errors);
}

export function validateGenerationRequest(body: unknown): string[] {
    if (!isRecord(body)) {
        return ['Request body must be a JSON object'];
    }

    const errors: string[] = [];
    validateTopic(body.topic, errors);

    const slideCount = body.slide_count ?? body.slides;
    if (slideCount !== undefined) validateSlideCount(slideCount, errors);

    if (body.tone !== undefined && (typeof body.tone !== 'string' || !body.tone.trim())) {
        errors.push("'tone' must be a non-empty string");
    }
    if (body.images_per_slide !== undefined) {
        checkInteger(body.images_per_slide, 'images_per_slide', 0, MAX_IMAGES_PER_SLIDE, errors);
    }
    if (body.template_reference !== undefined && body.template_reference !== null) {
        if (typeof body.template_reference !== 'string' || !body.template_reference.trim()) {
            errors.push("'template_reference' must be a non-empty string");
        } else if (body.template_reference.includes('\0')) {
            errors.push("'template_reference' contains an invalid character");
        }
    }

    return errors;
}

/**
 * Accept a request body and freeze it as a GenerationRequest, applying defaults.
 */
export function toGenerationRequest(body: unknown): GenerationRequest {
    const errors = validateGenerationRequest(body);
    if (errors.length > 0 || !isRecord(body)) {
        throw new ValidationError(`Invalid generation request: ${errors.join('; ')}`, errors);
    }

    const slideCount = body.slide_count ?? body.slides;
    const request: GenerationRequest = {
        topic: String(body.topic).trim(),
        slideCount: typeof slideCount === 'number' ? slideCount : DEFAULT_NUM_SLIDES,
        tone: typeof body.tone === 'string' ? body.tone.trim() : DEFAULT_TONE,
        imagesPerSlide: typeof body.images_per_slide === 'number' ? body.images_per_slide : DEFAULT_IMAGES_PER_SLIDE,
        ...(typeof body.template_reference === 'string' ? { templateReference: body.template_reference.trim() } : {}),
    };
    return Object.freeze(request);
}

export function validateScriptEntryInput(value: unknown, idx: number): string[] {
    const prefix = `Slide ${idx + 1}`;
    if (!isRecord(value)) {
        return [`${prefix}: Invalid object`];
    }

    const errors: string[] = [];
    if (typeof value.title !== 'string') errors.push(`${prefix}: 'title' must be a string`);
    if (value.bullets !== undefined) {
        if (!Array.isArray(value.bullets) || value.bullets.some(b => typeof b !== 'string')) {
            errors.push(`${prefix}: 'bullets' must be an array of strings`);
        }
    }
    if (value.notes !== undefined && value.notes !== null && typeof value.notes !== 'string') {
        errors.push(`${prefix}: 'notes' must be a string`);
    }
    return errors;
}

export function toScriptEntry(value: unknown, idx: number): ScriptEntry {
    const errors = validateScriptEntryInput(value, idx);
    if (errors.length > 0 || !isRecord(value)) {
        throw new ValidationError(errors.join('; '), errors);
    }
    const bullets = Array.isArray(value.bullets) ? value.bullets.map(String) : [];
    return {
        title: String(value.title),
        bullets,
        ...(typeof value.notes === 'string' && value.notes ? { notes: value.notes } : {}),
    };
}

export function toImageAssets(value: unknown, context: string): ImageAsset[] {
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
        throw new ValidationError(`${context}: 'images' must be an array`, [`${context}: 'images' must be an array`]);
    }

    const errors: string[] = [];
    const assets: ImageAsset[] = [];
    value.forEach((item, i) => {
        if (!isRecord(item) || (item.kind !== 'photo' && item.kind !== 'placeholder')
            || typeof item.reference !== 'string' || typeof item.sourceUrl !== 'string') {
            errors.push(`${context}: image ${i + 1} must have kind, sourceUrl and reference`);
            return;
        }
        assets.push({
            kind: item.kind,
            sourceUrl: item.sourceUrl,
            reference: item.reference,
            attribution: typeof item.attribution === 'string' ? item.attribution : '',
            ...(typeof item.width === 'number' ? { width: item.width } : {}),
            ...(typeof item.height === 'number' ? { height: item.height } : {}),
        });
    });

    if (errors.length > 0) {
        throw new ValidationError(errors.join('; '), errors);
    }
    return assets;
}
