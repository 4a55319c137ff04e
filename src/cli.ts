import { pathToFileURL } from 'url';
import { randomScene } from './scene/random-scene';
import { writePPM } from './ppmexporter';
import { rowRandom } from './random';
import { InlineRowExecutor, renderImage, type RowExecutor } from './render/renderer';
import { DEFAULT_RENDER_SETTINGS, resolveRenderSettings, type RenderSettings } from './settings';
import { RowWorkerPool } from './workers/pool';

// Same acceptance as a 32-bit integer parse: optional sign, surrounding blanks
const INTEGER = /^\s*[+-]?\d+\s*$/;

function parseInt32(value: string): number | null {
  if (!INTEGER.test(value)) return null;
  const n = Number(value.trim());
  return n >= -2147483648 && n <= 2147483647 ? n : null;
}

/**
 * `width height` when exactly two integer arguments are given, otherwise the
 * default resolution. Bad input is not reported.
 */
export function parseDimensions(args: readonly string[]): Pick<RenderSettings, 'width' | 'height'> {
  const fallback = { width: DEFAULT_RENDER_SETTINGS.width, height: DEFAULT_RENDER_SETTINGS.height };
  if (args.length !== 2) return fallback;
  const width = parseInt32(args[0]);
  const height = parseInt32(args[1]);
  if (width === null || height === null) return fallback;
  return { width, height };
}

export function createExecutor(settings: RenderSettings): RowExecutor {
  return settings.workers > 1 ? new RowWorkerPool(settings.workers) : new InlineRowExecutor();
}

export async function main(args: readonly string[]): Promise<void> {
  const settings = resolveRenderSettings(parseDimensions(args));
  console.log(
    `Rendering ${settings.width}x${settings.height} image with ${settings.samplesPerPixel} samples...`
  );

  // Scene layout follows the seed too, so a seeded run is fully repeatable
  const scene = randomScene(rowRandom(settings.seed, -1));
  const image = await renderImage(scene, settings, createExecutor(settings));

  const path = writePPM(image, settings.output);
  console.log(`Done! Saved to: ${path}`);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  await main(process.argv.slice(2));
}
