/**
 * @module bindings
 * Per-tool mapping from merged arguments to a Composer call.
 *
 * Each binding reads its parameters up front (so a bad argument fails before
 * any lock is taken) and returns a call to run against the draft's folder.
 * Timed assets other than video and audio are described to the Composer by
 * `start` and `duration = end - start`; the difference is passed through
 * even when zero or negative.
 */

import type {
  AudioParams,
  Composer,
  DraftState,
  EffectParams,
  ImageParams,
  StickerParams,
  SubtitleParams,
  TextParams,
  ToolArguments,
  ToolName,
  VideoParams,
} from '@draftcast/types';
import {
  optionalArray,
  optionalNumber,
  optionalRecords,
  optionalString,
  readBoolean,
  readNumber,
  readString,
} from './arguments.js';

/** A prepared Composer call against a draft's backing folder. */
export type ComposerCall = (composer: Composer, folder: string) => Promise<unknown>;

/** Tools that mutate an existing draft. */
export type MutatingToolName = Exclude<ToolName, 'create_draft'>;

export interface ToolBinding {
  /** Session state after a successful call. */
  nextState: DraftState;
  prepare(args: ToolArguments): ComposerCall;
}

/** Track every text segment lands on. */
export const TEXT_TRACK_NAME = 'text_main';

/** `end - start` of a timed asset. */
export function durationOf(args: ToolArguments): number {
  return readNumber(args, 'end') - readNumber(args, 'start');
}

function videoParams(args: ToolArguments): VideoParams {
  return {
    video_url: readString(args, 'video_url'),
    start: readNumber(args, 'start'),
    end: optionalNumber(args, 'end'),
    target_start: readNumber(args, 'target_start'),
    width: readNumber(args, 'width'),
    height: readNumber(args, 'height'),
    transform_x: readNumber(args, 'transform_x'),
    transform_y: readNumber(args, 'transform_y'),
    scale_x: readNumber(args, 'scale_x'),
    scale_y: readNumber(args, 'scale_y'),
    speed: readNumber(args, 'speed'),
    track_name: readString(args, 'track_name'),
    volume: readNumber(args, 'volume'),
    transition: optionalString(args, 'transition'),
    transition_duration: readNumber(args, 'transition_duration'),
    mask_type: optionalString(args, 'mask_type'),
    background_blur: optionalNumber(args, 'background_blur'),
  };
}

function audioParams(args: ToolArguments): AudioParams {
  return {
    audio_url: readString(args, 'audio_url'),
    start: readNumber(args, 'start'),
    end: optionalNumber(args, 'end'),
    target_start: readNumber(args, 'target_start'),
    volume: readNumber(args, 'volume'),
    speed: readNumber(args, 'speed'),
    track_name: readString(args, 'track_name'),
    width: readNumber(args, 'width'),
    height: readNumber(args, 'height'),
  };
}

function imageParams(args: ToolArguments): ImageParams {
  return {
    image_url: readString(args, 'image_url'),
    start: readNumber(args, 'start'),
    duration: durationOf(args),
    width: readNumber(args, 'width'),
    height: readNumber(args, 'height'),
    transform_x: readNumber(args, 'transform_x'),
    transform_y: readNumber(args, 'transform_y'),
    scale_x: readNumber(args, 'scale_x'),
    scale_y: readNumber(args, 'scale_y'),
    track_name: readString(args, 'track_name'),
    intro_animation: optionalString(args, 'intro_animation'),
    outro_animation: optionalString(args, 'outro_animation'),
    transition: optionalString(args, 'transition'),
    mask_type: optionalString(args, 'mask_type'),
  };
}

function textParams(args: ToolArguments): TextParams {
  return {
    text: readString(args, 'text'),
    start: readNumber(args, 'start'),
    duration: durationOf(args),
    font_color: readString(args, 'font_color'),
    font_size: readNumber(args, 'font_size'),
    track_name: TEXT_TRACK_NAME,
    width: readNumber(args, 'width'),
    height: readNumber(args, 'height'),
    text_styles: optionalRecords(args, 'text_styles'),
    shadow_enabled: readBoolean(args, 'shadow_enabled'),
    shadow_color: readString(args, 'shadow_color'),
    shadow_alpha: readNumber(args, 'shadow_alpha'),
    shadow_angle: readNumber(args, 'shadow_angle'),
    shadow_distance: readNumber(args, 'shadow_distance'),
    shadow_smoothing: readNumber(args, 'shadow_smoothing'),
    background_color: optionalString(args, 'background_color'),
    background_alpha: readNumber(args, 'background_alpha'),
    background_style: readNumber(args, 'background_style'),
    background_round_radius: readNumber(args, 'background_round_radius'),
  };
}

function subtitleParams(args: ToolArguments): SubtitleParams {
  return {
    srt_path: readString(args, 'srt_path'),
    track_name: readString(args, 'track_name'),
    time_offset: readNumber(args, 'time_offset'),
    font: optionalString(args, 'font'),
    font_size: readNumber(args, 'font_size'),
    font_color: readString(args, 'font_color'),
    bold: readBoolean(args, 'bold'),
    italic: readBoolean(args, 'italic'),
    underline: readBoolean(args, 'underline'),
    border_width: readNumber(args, 'border_width'),
    border_color: readString(args, 'border_color'),
    background_color: readString(args, 'background_color'),
    background_alpha: readNumber(args, 'background_alpha'),
    transform_x: readNumber(args, 'transform_x'),
    transform_y: readNumber(args, 'transform_y'),
    width: readNumber(args, 'width'),
    height: readNumber(args, 'height'),
  };
}

function effectParams(args: ToolArguments): EffectParams {
  return {
    effect_type: readString(args, 'effect_type'),
    start: readNumber(args, 'start'),
    duration: durationOf(args),
    track_name: readString(args, 'track_name'),
    params: optionalArray(args, 'params') ?? [],
    width: readNumber(args, 'width'),
    height: readNumber(args, 'height'),
  };
}

function stickerParams(args: ToolArguments): StickerParams {
  return {
    sticker_url: readString(args, 'sticker_url'),
    start: readNumber(args, 'start'),
    duration: durationOf(args),
    width: readNumber(args, 'width'),
    height: readNumber(args, 'height'),
    transform_x: readNumber(args, 'transform_x'),
    transform_y: readNumber(args, 'transform_y'),
    scale_x: readNumber(args, 'scale_x'),
    scale_y: readNumber(args, 'scale_y'),
    rotation: readNumber(args, 'rotation'),
    track_name: readString(args, 'track_name'),
  };
}

/** Bindings for every tool that operates on an existing draft. */
export const TOOL_BINDINGS: Record<MutatingToolName, ToolBinding> = {
  add_video: {
    nextState: 'COMPOSING',
    prepare: (args) => {
      const params = videoParams(args);
      return (composer, folder) => composer.addVideo(folder, params);
    },
  },
  add_audio: {
    nextState: 'COMPOSING',
    prepare: (args) => {
      const params = audioParams(args);
      return (composer, folder) => composer.addAudio(folder, params);
    },
  },
  add_image: {
    nextState: 'COMPOSING',
    prepare: (args) => {
      const params = imageParams(args);
      return (composer, folder) => composer.addImage(folder, params);
    },
  },
  add_text: {
    nextState: 'COMPOSING',
    prepare: (args) => {
      const params = textParams(args);
      return (composer, folder) => composer.addText(folder, params);
    },
  },
  add_subtitle: {
    nextState: 'COMPOSING',
    prepare: (args) => {
      const params = subtitleParams(args);
      return (composer, folder) => composer.addSubtitle(folder, params);
    },
  },
  add_effect: {
    nextState: 'COMPOSING',
    prepare: (args) => {
      const params = effectParams(args);
      return (composer, folder) => composer.addEffect(folder, params);
    },
  },
  add_sticker: {
    nextState: 'COMPOSING',
    prepare: (args) => {
      const params = stickerParams(args);
      return (composer, folder) => composer.addSticker(folder, params);
    },
  },
  save_draft: {
    nextState: 'SAVED',
    prepare: (args) => {
      const draftId = readString(args, 'draft_id');
      return (composer, folder) => composer.saveDraft(folder, draftId);
    },
  },
};

/** Narrow a tool name to one that has a binding. */
export function isMutatingTool(name: string): name is MutatingToolName {
  return Object.hasOwn(TOOL_BINDINGS, name);
}
