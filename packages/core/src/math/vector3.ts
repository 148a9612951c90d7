/**
 * 3D vector used for plane points and texture axes.
 *
 * Map sources are right-handed with z up; the parsers keep the coordinates
 * exactly as written and never transform them.
 */
export class Vector3 {
  constructor(
    public x: number = 0,
    public y: number = 0,
    public z: number = 0,
  ) {}

  set(x: number, y: number, z: number): this {
    this.x = x;
    this.y = y;
    this.z = z;
    return this;
  }

  clone(): Vector3 {
    return new Vector3(this.x, this.y, this.z);
  }

  dot(v: Readonly<Vector3>): number {
    return this.x * v.x + this.y * v.y + this.z * v.z;
  }

  equals(v: Readonly<Vector3>, epsilon = 1e-6): boolean {
    return (
      Math.abs(this.x - v.x) < epsilon &&
      Math.abs(this.y - v.y) < epsilon &&
      Math.abs(this.z - v.z) < epsilon
    );
  }

  toArray(): [number, number, number] {
    return [this.x, this.y, this.z];
  }

  toJSON(): [number, number, number] {
    return this.toArray();
  }

  static fromArray(arr: readonly [number, number, number]): Vector3 {
    return new Vector3(arr[0], arr[1], arr[2]);
  }

  static readonly ZERO = Object.freeze(new Vector3(0, 0, 0));
}
