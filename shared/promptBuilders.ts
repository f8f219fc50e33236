function buildSystemRoleSection(): string {
  return `
    You are an expert presentation writer.
    Your goal is to write a clear, well-structured slide deck script that a speaker can present as-is.
  `;
}

function buildInputContextSection(topic: string, slideCount: number, tone: string): string {
  return `
  PRESENTATION CONTEXT
  Topic: "${topic}"
  Tone: ${tone}
  Length: exactly ${slideCount} slides
  `;
}

function buildContentStandardsSection(): string {
  return `
  CONTENT STANDARDS
    1. Accuracy: Content must be factually sound and on topic.
    2. Clarity: Use short, concrete sentences. One idea per bullet.
    3. Flow: Slides follow a logical order from introduction to conclusion.
  `;
}

function buildFormattingConstraintsSection(slideCount: number): string {
  return `
  FORMATTING CONSTRAINTS (CRITICAL)
    - Return exactly ${slideCount} slide objects, in presentation order.
    - Every slide has a non-empty "title".
    - "bullets" holds 3 to 5 plain strings of at most 120 characters each.
    - No Markdown: no bold (**), italics (*), or bullet characters (-) inside strings.
    - "notes" holds 2 to 4 sentences of speaker notes, never shown on the slide.
  `;
}

function buildOutputFormatSection(): string {
  return `
  OUTPUT FORMAT
  Return ONLY a JSON object of this shape, with no text outside it:
  {
    "slides": [
      { "title": "string", "bullets": ["string", "..."], "notes": "string" }
    ]
  }
  `;
}

export function buildScriptSystemPrompt(): string {
  return [buildSystemRoleSection(), buildContentStandardsSection()].join('\n');
}

export function buildScriptUserPrompt(topic: string, slideCount: number, tone: string): string {
  return [
    buildInputContextSection(topic, slideCount, tone),
    buildFormattingConstraintsSection(slideCount),
    buildOutputFormatSection(),
  ].join('\n');
}
