import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import { flattenHittables, hit, hitSphere, hittableList, sphere } from './hittable';
import { dielectric, lambertian, metal } from './materials';

const grey = lambertian(new THREE.Vector3(0.5, 0.5, 0.5));

function expectVec(v: THREE.Vector3, x: number, y: number, z: number) {
  expect(v.x).toBeCloseTo(x);
  expect(v.y).toBeCloseTo(y);
  expect(v.z).toBeCloseTo(z);
}

describe('hitSphere', () => {
  const origin = new THREE.Vector3(0, 0, 0);

  it('hits the near side of a unit sphere head-on', () => {
    const ray = new THREE.Ray(new THREE.Vector3(0, 0, -5), new THREE.Vector3(0, 0, 1));
    const rec = hitSphere(origin, 1, grey, ray, 0.001, Infinity);
    expect(rec).not.toBeNull();
    expect(rec?.t).toBe(4);
    expect(rec?.frontFace).toBe(true);
    expect(rec?.material).toBe(grey);
    if (rec) {
      expectVec(rec.normal, 0, 0, -1);
      expectVec(rec.p, 0, 0, -1);
    }
  });

  it('uses the far root from inside and flips the normal', () => {
    const ray = new THREE.Ray(new THREE.Vector3(0, 0, 0), new THREE.Vector3(0, 0, 1));
    const rec = hitSphere(origin, 1, grey, ray, 0.001, Infinity);
    expect(rec?.t).toBe(1);
    expect(rec?.frontFace).toBe(false);
    if (rec) expectVec(rec.normal, 0, 0, -1);
  });

  it('misses when the discriminant is negative', () => {
    const ray = new THREE.Ray(new THREE.Vector3(0, 2, -5), new THREE.Vector3(0, 0, 1));
    expect(hitSphere(origin, 1, grey, ray, 0.001, Infinity)).toBeNull();
  });

  it('misses when both roots fall outside the interval', () => {
    const ray = new THREE.Ray(new THREE.Vector3(0, 0, -5), new THREE.Vector3(0, 0, 1));
    expect(hitSphere(origin, 1, grey, ray, 0.001, 3)).toBeNull();
  });

  it('does not require a unit direction', () => {
    const ray = new THREE.Ray(new THREE.Vector3(0, 0, -5), new THREE.Vector3(0, 0, 2));
    const rec = hitSphere(origin, 1, grey, ray, 0.001, Infinity);
    expect(rec?.t).toBe(2);
    if (rec) expectVec(rec.normal, 0, 0, -1);
  });
});

describe('hit', () => {
  const ray = new THREE.Ray(new THREE.Vector3(0, 0, -5), new THREE.Vector3(0, 0, 1));
  const near = sphere(new THREE.Vector3(0, 0, 0), 1, metal(new THREE.Vector3(1, 1, 1), 0));
  const far = sphere(new THREE.Vector3(0, 0, 0.5), 1, dielectric(1.5));

  it('returns the closest of two overlapping spheres whatever the order', () => {
    expect(hit([far, near], ray, 0.001, Infinity)?.t).toBe(4);
    expect(hit([far, near], ray, 0.001, Infinity)?.material).toBe(near.material);
    expect(hit([near, far], ray, 0.001, Infinity)?.material).toBe(near.material);
  });

  it('keeps the earlier sphere on an exact tie', () => {
    const twin = sphere(near.center, near.radius, dielectric(2.4));
    expect(hit([near, twin], ray, 0.001, Infinity)?.material).toBe(near.material);
    expect(hit([twin, near], ray, 0.001, Infinity)?.material).toBe(twin.material);
  });

  it('returns null for an empty scene', () => {
    expect(hit([], ray, 0.001, Infinity)).toBeNull();
  });
});

describe('flattenHittables', () => {
  it('flattens nested lists depth-first in order', () => {
    const a = sphere(new THREE.Vector3(0, 0, 0), 1, grey);
    const b = sphere(new THREE.Vector3(1, 0, 0), 1, grey);
    const c = sphere(new THREE.Vector3(2, 0, 0), 1, grey);
    const scene = flattenHittables([a, hittableList([b, hittableList([])]), hittableList([c])]);
    expect(scene).toEqual([a, b, c]);
  });
});
