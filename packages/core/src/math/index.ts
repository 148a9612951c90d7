export { Vector2 } from './vector2.js';
export { Vector3 } from './vector3.js';
export { Vector4 } from './vector4.js';
