import { writeFileSync } from 'fs';
import { resolve } from 'path';
import { toRGB, type RenderedImage } from './render/renderer';

/**
 * Plain-text PPM ("P3"): header, then one `r g b` line per pixel from the top
 * row down, left to right.
 */
export function exportToPPM(image: RenderedImage): string {
  const rgb = toRGB(image);
  const lines: string[] = [`P3\n${image.width} ${image.height}\n255`];
  for (let k = 0; k < rgb.length; k += 3) {
    lines.push(`${rgb[k]} ${rgb[k + 1]} ${rgb[k + 2]}`);
  }
  return lines.join('\n') + '\n';
}

/** Writes the image and returns the absolute path. Write errors propagate. */
export function writePPM(image: RenderedImage, filename: string = 'output.ppm'): string {
  const path = resolve(filename);
  writeFileSync(path, exportToPPM(image));
  return path;
}
