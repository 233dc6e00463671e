/**
 * @module catalog
 * The tool catalog: the single source of truth for tool names and argument
 * schemas, consulted by both transports' ListTools and by dispatch validation.
 *
 * Every tool except `create_draft` declares `draft_id`; the Dispatch Core
 * resolves it against the draft registry before any other check runs.
 */

import type { ToolDescriptor } from '@draftcast/types';

const TOOLS: ToolDescriptor[] = [
  // ── Draft lifecycle ───────────────────────────────────────────
  {
    name: 'create_draft',
    description:
      'Create a new empty draft with the given canvas size. Returns the draft_id used by every other tool.',
    inputSchema: {
      type: 'object',
      properties: {
        width: { type: 'integer', default: 1080, description: 'Canvas width in pixels' },
        height: { type: 'integer', default: 1920, description: 'Canvas height in pixels' },
      },
    },
  },

  // ── Timed media ───────────────────────────────────────────────
  {
    name: 'add_video',
    description: 'Add a video clip to a draft, with optional transition, mask and background blur.',
    inputSchema: {
      type: 'object',
      properties: {
        video_url: { type: 'string', description: 'Video URL or local path' },
        draft_id: { type: 'string', description: 'Target draft ID' },
        start: { type: 'number', default: 0, description: 'Source start time (seconds)' },
        end: { type: 'number', description: 'Source end time (seconds)' },
        target_start: { type: 'number', default: 0, description: 'Position on the timeline (seconds)' },
        width: { type: 'integer', default: 1080, description: 'Canvas width in pixels' },
        height: { type: 'integer', default: 1920, description: 'Canvas height in pixels' },
        transform_x: { type: 'number', default: 0, description: 'Horizontal position' },
        transform_y: { type: 'number', default: 0, description: 'Vertical position' },
        scale_x: { type: 'number', default: 1, description: 'Horizontal scale' },
        scale_y: { type: 'number', default: 1, description: 'Vertical scale' },
        speed: { type: 'number', default: 1, description: 'Playback speed' },
        track_name: { type: 'string', default: 'main', description: 'Track name' },
        volume: { type: 'number', default: 1, description: 'Volume' },
        transition: { type: 'string', description: 'Transition type' },
        transition_duration: { type: 'number', default: 0.5, description: 'Transition duration (seconds)' },
        mask_type: { type: 'string', description: 'Mask type' },
        background_blur: { type: 'integer', description: 'Background blur level (1-4)' },
      },
      required: ['video_url'],
    },
  },
  {
    name: 'add_audio',
    description: 'Add an audio clip to a draft.',
    inputSchema: {
      type: 'object',
      properties: {
        audio_url: { type: 'string', description: 'Audio URL or local path' },
        draft_id: { type: 'string', description: 'Target draft ID' },
        start: { type: 'number', default: 0, description: 'Source start time (seconds)' },
        end: { type: 'number', description: 'Source end time (seconds)' },
        target_start: { type: 'number', default: 0, description: 'Position on the timeline (seconds)' },
        volume: { type: 'number', default: 1, description: 'Volume' },
        speed: { type: 'number', default: 1, description: 'Playback speed' },
        track_name: { type: 'string', default: 'audio_main', description: 'Track name' },
        width: { type: 'integer', default: 1080, description: 'Canvas width in pixels' },
        height: { type: 'integer', default: 1920, description: 'Canvas height in pixels' },
      },
      required: ['audio_url'],
    },
  },
  {
    name: 'add_image',
    description: 'Add a still image to a draft, with optional animations, transition and mask.',
    inputSchema: {
      type: 'object',
      properties: {
        image_url: { type: 'string', description: 'Image URL or local path' },
        draft_id: { type: 'string', description: 'Target draft ID' },
        start: { type: 'number', default: 0, description: 'Start time (seconds)' },
        end: { type: 'number', default: 3, description: 'End time (seconds)' },
        width: { type: 'integer', default: 1080, description: 'Canvas width in pixels' },
        height: { type: 'integer', default: 1920, description: 'Canvas height in pixels' },
        transform_x: { type: 'number', default: 0, description: 'Horizontal position' },
        transform_y: { type: 'number', default: 0, description: 'Vertical position' },
        scale_x: { type: 'number', default: 1, description: 'Horizontal scale' },
        scale_y: { type: 'number', default: 1, description: 'Vertical scale' },
        track_name: { type: 'string', default: 'main', description: 'Track name' },
        intro_animation: { type: 'string', description: 'Intro animation' },
        outro_animation: { type: 'string', description: 'Outro animation' },
        transition: { type: 'string', description: 'Transition type' },
        mask_type: { type: 'string', description: 'Mask type' },
      },
      required: ['image_url'],
    },
  },

  // ── Text and overlays ─────────────────────────────────────────
  {
    name: 'add_text',
    description: 'Add a text segment to a draft, with multi-range styles, shadow and background.',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Text content' },
        start: { type: 'number', description: 'Start time (seconds)' },
        end: { type: 'number', description: 'End time (seconds)' },
        draft_id: { type: 'string', description: 'Target draft ID' },
        font_color: { type: 'string', default: '#ffffff', description: 'Font color' },
        font_size: { type: 'integer', default: 24, description: 'Font size' },
        shadow_enabled: { type: 'boolean', default: false, description: 'Enable text shadow' },
        shadow_color: { type: 'string', default: '#000000', description: 'Shadow color' },
        shadow_alpha: { type: 'number', default: 0.8, description: 'Shadow opacity' },
        shadow_angle: { type: 'number', default: 315, description: 'Shadow angle' },
        shadow_distance: { type: 'number', default: 5, description: 'Shadow distance' },
        shadow_smoothing: { type: 'number', default: 0, description: 'Shadow smoothing' },
        background_color: { type: 'string', description: 'Background color' },
        background_alpha: { type: 'number', default: 1, description: 'Background opacity' },
        background_style: { type: 'integer', default: 0, description: 'Background style' },
        background_round_radius: { type: 'number', default: 0, description: 'Background corner radius' },
        text_styles: { type: 'array', items: { type: 'object' }, description: 'Per-range text style list' },
      },
      required: ['text', 'start', 'end'],
    },
  },
  {
    name: 'add_subtitle',
    description: 'Import an SRT subtitle file into a draft with the given style.',
    inputSchema: {
      type: 'object',
      properties: {
        srt_path: { type: 'string', description: 'SRT file path or URL' },
        draft_id: { type: 'string', description: 'Target draft ID' },
        track_name: { type: 'string', default: 'subtitle', description: 'Track name' },
        time_offset: { type: 'number', default: 0, description: 'Time offset (seconds)' },
        font: { type: 'string', description: 'Font' },
        font_size: { type: 'number', default: 8, description: 'Font size' },
        font_color: { type: 'string', default: '#FFFFFF', description: 'Font color' },
        bold: { type: 'boolean', default: false, description: 'Bold' },
        italic: { type: 'boolean', default: false, description: 'Italic' },
        underline: { type: 'boolean', default: false, description: 'Underline' },
        border_width: { type: 'number', default: 0, description: 'Border width' },
        border_color: { type: 'string', default: '#000000', description: 'Border color' },
        background_color: { type: 'string', default: '#000000', description: 'Background color' },
        background_alpha: { type: 'number', default: 0, description: 'Background opacity' },
        transform_x: { type: 'number', default: 0, description: 'Horizontal position' },
        transform_y: { type: 'number', default: -0.8, description: 'Vertical position' },
        width: { type: 'integer', default: 1080, description: 'Canvas width in pixels' },
        height: { type: 'integer', default: 1920, description: 'Canvas height in pixels' },
      },
      required: ['srt_path'],
    },
  },
  {
    name: 'add_effect',
    description: 'Add a named effect to a draft.',
    inputSchema: {
      type: 'object',
      properties: {
        effect_type: { type: 'string', description: 'Effect type name' },
        draft_id: { type: 'string', description: 'Target draft ID' },
        start: { type: 'number', default: 0, description: 'Start time (seconds)' },
        end: { type: 'number', default: 3, description: 'End time (seconds)' },
        track_name: { type: 'string', default: 'effect_01', description: 'Track name' },
        params: { type: 'array', description: 'Effect parameter list' },
        width: { type: 'integer', default: 1080, description: 'Canvas width in pixels' },
        height: { type: 'integer', default: 1920, description: 'Canvas height in pixels' },
      },
      required: ['effect_type'],
    },
  },
  {
    name: 'add_sticker',
    description: 'Add a sticker to a draft.',
    inputSchema: {
      type: 'object',
      properties: {
        sticker_url: { type: 'string', description: 'Sticker URL or resource ID' },
        draft_id: { type: 'string', description: 'Target draft ID' },
        start: { type: 'number', default: 0, description: 'Start time (seconds)' },
        end: { type: 'number', default: 3, description: 'End time (seconds)' },
        width: { type: 'integer', default: 1080, description: 'Canvas width in pixels' },
        height: { type: 'integer', default: 1920, description: 'Canvas height in pixels' },
        transform_x: { type: 'number', default: 0, description: 'Horizontal position' },
        transform_y: { type: 'number', default: 0, description: 'Vertical position' },
        scale_x: { type: 'number', default: 1, description: 'Horizontal scale' },
        scale_y: { type: 'number', default: 1, description: 'Vertical scale' },
        rotation: { type: 'number', default: 0, description: 'Rotation in degrees' },
        track_name: { type: 'string', default: 'sticker_main', description: 'Track name' },
      },
      required: ['sticker_url'],
    },
  },

  // ── Output ────────────────────────────────────────────────────
  {
    name: 'save_draft',
    description: 'Save a draft and render the final video.',
    inputSchema: {
      type: 'object',
      properties: {
        draft_id: { type: 'string', description: 'Target draft ID' },
      },
      required: ['draft_id'],
    },
  },
];

/** Recursively freeze a value so catalog consumers cannot alter it. */
function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/** Every tool, in catalog order. */
export const TOOL_CATALOG: readonly ToolDescriptor[] = deepFreeze(TOOLS);

const byName = new Map<string, ToolDescriptor>(TOOL_CATALOG.map((tool) => [tool.name, tool]));

/** Return the full catalog. Pure; safe to call concurrently. */
export function listTools(): readonly ToolDescriptor[] {
  return TOOL_CATALOG;
}

/** Look up a descriptor by name. */
export function findTool(name: string): ToolDescriptor | undefined {
  return byName.get(name);
}
