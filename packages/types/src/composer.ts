/**
 * @module composer
 * Contract of the external Composer that turns validated tool calls into
 * mutations of a draft's backing folder.
 *
 * Parameter objects keep the tool catalog's field names so they can be
 * forwarded to a composition backend unchanged. All times are in seconds.
 */

/** Parameters for adding a video segment. */
export interface VideoParams {
  video_url: string;
  start: number;
  /** Source end time; omitted means "to the end of the clip". */
  end?: number;
  target_start: number;
  width: number;
  height: number;
  transform_x: number;
  transform_y: number;
  scale_x: number;
  scale_y: number;
  speed: number;
  track_name: string;
  volume: number;
  transition?: string;
  transition_duration: number;
  mask_type?: string;
  /** Background blur level (1-4). */
  background_blur?: number;
}

/** Parameters for adding an audio segment. */
export interface AudioParams {
  audio_url: string;
  start: number;
  end?: number;
  target_start: number;
  volume: number;
  speed: number;
  track_name: string;
  width: number;
  height: number;
}

/** Parameters for adding a still image. */
export interface ImageParams {
  image_url: string;
  start: number;
  duration: number;
  width: number;
  height: number;
  transform_x: number;
  transform_y: number;
  scale_x: number;
  scale_y: number;
  track_name: string;
  intro_animation?: string;
  outro_animation?: string;
  transition?: string;
  mask_type?: string;
}

/** Styling applied to a character range of a text segment. */
export type TextStyleRange = Record<string, unknown>;

/** Parameters for adding a text segment. */
export interface TextParams {
  text: string;
  start: number;
  duration: number;
  font_color: string;
  font_size: number;
  track_name: string;
  width: number;
  height: number;
  text_styles?: TextStyleRange[];
  shadow_enabled: boolean;
  shadow_color: string;
  shadow_alpha: number;
  shadow_angle: number;
  shadow_distance: number;
  shadow_smoothing: number;
  background_color?: string;
  background_alpha: number;
  background_style: number;
  background_round_radius: number;
}

/** Parameters for importing an SRT subtitle file. */
export interface SubtitleParams {
  srt_path: string;
  track_name: string;
  time_offset: number;
  font?: string;
  font_size: number;
  font_color: string;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  border_width: number;
  border_color: string;
  background_color: string;
  background_alpha: number;
  transform_x: number;
  transform_y: number;
  width: number;
  height: number;
}

/** Parameters for adding a named effect. */
export interface EffectParams {
  effect_type: string;
  start: number;
  duration: number;
  track_name: string;
  params: unknown[];
  width: number;
  height: number;
}

/** Parameters for adding a sticker. */
export interface StickerParams {
  sticker_url: string;
  start: number;
  duration: number;
  width: number;
  height: number;
  transform_x: number;
  transform_y: number;
  scale_x: number;
  scale_y: number;
  rotation: number;
  track_name: string;
}

/**
 * The composition backend. Implementations may block on file or network I/O;
 * callers bound each call with a timeout.
 */
export interface Composer {
  /** Materialise a backing folder and return its handle. */
  createDraft(draftId: string, width: number, height: number): Promise<string>;
  addVideo(folder: string, params: VideoParams): Promise<unknown>;
  addAudio(folder: string, params: AudioParams): Promise<unknown>;
  addImage(folder: string, params: ImageParams): Promise<unknown>;
  addText(folder: string, params: TextParams): Promise<unknown>;
  addSubtitle(folder: string, params: SubtitleParams): Promise<unknown>;
  addEffect(folder: string, params: EffectParams): Promise<unknown>;
  addSticker(folder: string, params: StickerParams): Promise<unknown>;
  saveDraft(folder: string, draftId: string): Promise<unknown>;
  /** Whether the backend is reachable. */
  healthCheck(): Promise<boolean>;
}
