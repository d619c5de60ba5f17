import type { HolidayRule, SceneDescriptor } from '../domain/types.js';

const NO_TEXT = 'No text, no letters, no numbers, no logos, no watermark.';

/**
 * Regular posts: one recurring character in a flat meme-illustration style,
 * placed in the selected scene. Upper and lower thirds are kept calm for the
 * text overlay.
 */
export function buildScenePrompt(scene: SceneDescriptor, extraDetail?: string): string {
  const background = [scene.description, scene.details].map(s => s.trim()).filter(Boolean).join(', ');
  return [
    `A melancholic hand-drawn internet meme illustration.`,
    `A pale, thin-faced character in a black beanie and dark hoodie, tired eyes, side-facing portrait with shoulders visible, centered in the frame.`,
    `Background: ${background}, moody and cold atmosphere.`,
    extraDetail?.trim() ? `Extra detail: ${extraDetail.trim()}.` : ``,
    `Flat colors, rough outlines, low-detail shading, high contrast.`,
    `Keep the top and bottom of the frame simple and uncluttered.`,
    NO_TEXT,
  ]
    .filter(Boolean)
    .join(' ');
}

/** Holiday posts use a photorealistic template driven by the holiday's own scene line. */
export function buildHolidayPrompt(holiday: HolidayRule, extraDetail?: string): string {
  return [
    `Dramatic photorealistic digital art, cinematic photography style, ultra high detail.`,
    `${holiday.scene.trim()}, with a wide sense of depth and scale.`,
    extraDetail?.trim() ? `Extra detail: ${extraDetail.trim()}.` : ``,
    `High contrast, deep shadows, bold colors, urban grit.`,
    `Intense, driven mood. Sharp focus, magazine-quality composition.`,
    NO_TEXT,
  ]
    .filter(Boolean)
    .join(' ');
}
