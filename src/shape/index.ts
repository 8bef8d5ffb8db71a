export type { ActualShape, ShapeAdapter } from './shape.js';
export { ShapeSchema, validateShape, shapeOf, shapeEquals, shapeToString } from './shape.js';
