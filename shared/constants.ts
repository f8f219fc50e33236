import type { TemplateTheme } from './types';

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_NUM_SLIDES = 6;
export const DEFAULT_TONE = 'neutral';
export const DEFAULT_IMAGES_PER_SLIDE = 1;

export const MAX_SLIDES = 20;
export const MAX_IMAGES_PER_SLIDE = 4;
export const MAX_IMAGES_PER_QUERY = 50;
export const MAX_TOPIC_LENGTH = 200;
export const CANDIDATES_PER_IMAGE = 3;

// Model Constants
export const MODEL_SCRIPT_GENERATION = 'gemini-2.5-flash';

// Layout contract, in inches on a 16:9 canvas
export const SLIDE_WIDTH = 10;
export const SLIDE_HEIGHT = 5.625;
export const TEXT_REGION_RATIO = 0.55;
export const MARGIN_X = 0.4;
export const TITLE_TOP = 0.3;
export const TITLE_HEIGHT = 0.9;
export const BODY_TOP = 1.35;
export const BOTTOM_MARGIN = 0.35;
export const IMAGE_GAP = 0.2;
export const IMAGE_MAX_W = 3.5;
export const IMAGE_MAX_H = 3.0;

export const MAX_BULLET_CHARS = 150;
export const TRUNCATION_MARK = '…';

// Bullet text fitting: points, plus inches for the text box inset and bullet indent
export const MIN_BULLET_FONT_SIZE = 12;
export const BULLET_LINE_SPACING = 1.2;
export const BULLET_PARA_SPACE_PT = 6;
export const AVG_CHAR_WIDTH_EM = 0.5;
export const TEXT_INSET = 0.1;
export const BULLET_INDENT = 0.3;

export const MAX_ARTIFACT_NAME_LENGTH = 60;
export const FALLBACK_ARTIFACT_NAME = 'deck';

export const PLACEHOLDER_REFERENCE = 'placeholder:no-image';
export const PLACEHOLDER_LABEL = 'No image available';

export const DEFAULT_THEME: TemplateTheme = {
    name: 'default',
    background: 'FFFFFF',
    titleColor: '1F2937',
    bodyColor: '374151',
    accentColor: '2563EB',
    fontFace: 'Arial',
    titleFontSize: 30,
};
