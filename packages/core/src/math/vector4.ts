import { Vector3 } from './vector3.js';

/**
 * 4D vector. A Valve-220 texture axis is `[ x y z offset ]`, which is why
 * `xyz()` and `w` are split apart so often.
 */
export class Vector4 {
  constructor(
    public x: number = 0,
    public y: number = 0,
    public z: number = 0,
    public w: number = 0,
  ) {}

  set(x: number, y: number, z: number, w: number): this {
    this.x = x;
    this.y = y;
    this.z = z;
    this.w = w;
    return this;
  }

  clone(): Vector4 {
    return new Vector4(this.x, this.y, this.z, this.w);
  }

  xyz(): Vector3 {
    return new Vector3(this.x, this.y, this.z);
  }

  equals(v: Readonly<Vector4>, epsilon = 1e-6): boolean {
    return (
      Math.abs(this.x - v.x) < epsilon &&
      Math.abs(this.y - v.y) < epsilon &&
      Math.abs(this.z - v.z) < epsilon &&
      Math.abs(this.w - v.w) < epsilon
    );
  }

  toArray(): [number, number, number, number] {
    return [this.x, this.y, this.z, this.w];
  }

  toJSON(): [number, number, number, number] {
    return this.toArray();
  }

  static fromArray(arr: readonly [number, number, number, number]): Vector4 {
    return new Vector4(arr[0], arr[1], arr[2], arr[3]);
  }
}
