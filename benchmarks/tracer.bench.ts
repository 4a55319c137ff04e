import { describe, bench } from 'vitest'
import * as THREE from 'three'
import { Camera } from '../src/camera'
import { hit } from '../src/hittable'
import { InlineRowExecutor, renderImage } from '../src/render/renderer'
import { randomScene } from '../src/scene/random-scene'
import { fromTuple } from '../src/scene/serialize'
import { resolveRenderSettings } from '../src/settings'
import { rayColor } from '../src/tracer'
import { defaultRandom } from '../src/random'

const world = randomScene(defaultRandom)
const settings = resolveRenderSettings({ workers: 1 })
const camera = new Camera({
  lookFrom: fromTuple(settings.lookFrom),
  lookAt: fromTuple(settings.lookAt),
  vup: fromTuple(settings.vup),
  vfov: settings.vfov,
  aspectRatio: 16 / 9,
  aperture: settings.aperture,
  focusDist: settings.focusDist,
})

describe('Tracer benchmarks', () => {
  bench('scene generation', () => {
    randomScene(defaultRandom)
  })

  bench('single ray through the showcase scene', () => {
    rayColor(camera.getRay(0.5, 0.5, defaultRandom), world, 50, defaultRandom)
  })

  bench('closest-hit query', () => {
    const ray = new THREE.Ray(new THREE.Vector3(0, 0, 0), new THREE.Vector3(0, 0, 1))
    hit(world, ray, 0, Infinity)
  })

  bench('camera ray generation', () => {
    camera.getRay(0.5, 0.5, defaultRandom)
  })
})

describe('Render benchmarks', () => {
  const executor = new InlineRowExecutor()

  bench('10x10, 1 sample', async () => {
    await renderImage(world, resolveRenderSettings({ width: 10, height: 10, samplesPerPixel: 1, maxDepth: 10 }), executor)
  })

  bench('50x50, 4 samples', async () => {
    await renderImage(world, resolveRenderSettings({ width: 50, height: 50, samplesPerPixel: 4, maxDepth: 10 }), executor)
  })

  bench('sky gradient only, 50x28, 10 samples', async () => {
    await renderImage([], resolveRenderSettings({ width: 50, height: 28, samplesPerPixel: 10 }), executor)
  })
})
