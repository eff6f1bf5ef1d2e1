/**
 * Filler Frame
 *
 * Black placeholder frame with "~ N units go by" across the middle,
 * drawn in place of the frames missed while the machine slept.
 */

import sharp from "sharp";
import { FILLER, type FrameDimensions, type ShotFormat } from "@ompd/types";

/**
 * Human-readable gap length, e.g. "~ 1.5 hrs go by", "~ 5 mins go by"
 */
export function formatElapsed(elapsedSecs: number): string {
  let value: number;
  let unit: string;
  let digits = 0;

  if (elapsedSecs >= 3600) {
    value = elapsedSecs / 3600;
    unit = "hr";
    digits = 1;
  } else if (elapsedSecs > 60) {
    value = elapsedSecs / 60;
    unit = "min";
  } else {
    value = elapsedSecs;
    unit = "sec";
  }

  const plural = value > 1 ? "s" : "";
  return `~ ${value.toFixed(digits)} ${unit}${plural} go by`;
}

/**
 * Font size starts at a fifth of the frame height and shrinks until the
 * estimated text width fits in 80% of the frame width
 */
export function computeFontSize(text: string, dimensions: FrameDimensions): number {
  const initial = dimensions.height * FILLER.FONT_HEIGHT_RATIO;
  const textWidth = text.length * initial * FILLER.GLYPH_WIDTH_RATIO;
  const maxWidth = dimensions.width * FILLER.MAX_TEXT_WIDTH_RATIO;

  return textWidth > maxWidth ? initial * (maxWidth / textWidth) : initial;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export function buildFillerSvg(text: string, dimensions: FrameDimensions): string {
  const { width, height } = dimensions;
  const fontSize = computeFontSize(text, dimensions).toFixed(1);

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">`,
    `<rect width="100%" height="100%" fill="${FILLER.BACKGROUND}"/>`,
    `<text x="50%" y="50%" fill="${FILLER.FOREGROUND}" font-family="sans-serif"`,
    ` font-size="${fontSize}" text-anchor="middle" dominant-baseline="middle">`,
    escapeXml(text),
    `</text></svg>`,
  ].join("");
}

/**
 * Render the filler for a gap and write it to `filePath`
 */
export async function writeFillerFrame(
  filePath: string,
  elapsedSecs: number,
  dimensions: FrameDimensions,
  format: ShotFormat
): Promise<void> {
  const svg = buildFillerSvg(formatElapsed(elapsedSecs), dimensions);
  await sharp(Buffer.from(svg)).toFormat(format).toFile(filePath);
}
