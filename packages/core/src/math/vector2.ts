/**
 * 2D vector used for texture offsets and texture scale on brush planes.
 */
export class Vector2 {
  constructor(
    public x: number = 0,
    public y: number = 0,
  ) {}

  set(x: number, y: number): this {
    this.x = x;
    this.y = y;
    return this;
  }

  clone(): Vector2 {
    return new Vector2(this.x, this.y);
  }

  equals(v: Readonly<Vector2>, epsilon = 1e-6): boolean {
    return Math.abs(this.x - v.x) < epsilon && Math.abs(this.y - v.y) < epsilon;
  }

  toArray(): [number, number] {
    return [this.x, this.y];
  }

  toJSON(): [number, number] {
    return this.toArray();
  }

  static fromArray(arr: readonly [number, number]): Vector2 {
    return new Vector2(arr[0], arr[1]);
  }

  static readonly ZERO = Object.freeze(new Vector2(0, 0));
}
