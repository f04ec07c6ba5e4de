export * from "./scalar.js";
export * from "./tolerance.js";
export * from "./errors.js";
export * from "./angle.js";
export * from "./delta.js";
export * from "./point.js";
export * from "./offset.js";
export * from "./line.js";
export * from "./arc.js";
export * from "./intersections.js";
export * from "./poly.js";
