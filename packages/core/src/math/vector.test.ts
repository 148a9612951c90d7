import { describe, it, expect } from 'vitest';
import { Vector2 } from './vector2.js';
import { Vector3 } from './vector3.js';
import { Vector4 } from './vector4.js';

describe('Vector3', () => {
  it('constructs with default values', () => {
    const v = new Vector3();
    expect(v.toArray()).toEqual([0, 0, 0]);
  });

  it('clones without sharing state', () => {
    const a = new Vector3(1, 2, 3);
    const b = a.clone().set(4, 5, 6);
    expect(a.toArray()).toEqual([1, 2, 3]);
    expect(b.toArray()).toEqual([4, 5, 6]);
  });

  it('computes dot product', () => {
    expect(new Vector3(1, 2, 3).dot(new Vector3(4, 5, 6))).toBe(32);
  });

  it('compares within epsilon', () => {
    expect(new Vector3(1, 2, 3).equals(new Vector3(1, 2, 3 + 1e-9))).toBe(true);
    expect(new Vector3(1, 2, 3).equals(new Vector3(1, 2, 3.1))).toBe(false);
  });

  it('serializes to a plain tuple', () => {
    expect(JSON.stringify({ p: new Vector3(-16, 64, 0.5) })).toBe('{"p":[-16,64,0.5]}');
  });

  it('keeps ZERO frozen', () => {
    expect(Object.isFrozen(Vector3.ZERO)).toBe(true);
  });
});

describe('Vector2', () => {
  it('round-trips through arrays', () => {
    expect(Vector2.fromArray([1.5, -2]).toArray()).toEqual([1.5, -2]);
  });
});

describe('Vector4', () => {
  it('splits the axis from the offset', () => {
    const axis = new Vector4(0, -1, 0, 16);
    expect(axis.xyz().toArray()).toEqual([0, -1, 0]);
    expect(axis.w).toBe(16);
  });
});
