import { Polygon, Polyline, type Arc, type Line, type Point } from "@planar/geometry";
import { PathBuilder, type PathBuilderOptions } from "./pathBuilder.js";

export type Drawable = Line | Arc | Polyline | Polygon;

export type SvgDocumentOptions = {
  viewBox: [minX: number, minY: number, width: number, height: number];
  stroke?: string;
  strokeWidth?: number;
  fill?: string;
};

function polyline(builder: PathBuilder, points: readonly Point[]): PathBuilder {
  points.forEach((p, i) => {
    if (i === 0) builder.moveTo(p.x, p.y);
    else builder.lineTo(p.x, p.y);
  });
  return builder;
}

/**
 * Path data for one shape, built only from its endpoints, vertices and arc
 * flags. Arcs use the absolute radius; a negative radius already places
 * `start()` and `stop()` on the far side of the center.
 */
export function toPathData(shape: Drawable, options: PathBuilderOptions = {}): string {
  const builder = new PathBuilder(options);
  if (shape instanceof Polyline) {
    return polyline(builder, shape.points()).build();
  }
  if (shape instanceof Polygon) {
    return polyline(builder, shape.points()).close().build();
  }

  const start = shape.start();
  const stop = shape.stop();
  builder.moveTo(start.x, start.y);
  if (shape.kind === "line") {
    return builder.lineTo(stop.x, stop.y).build();
  }
  const r = Math.abs(shape.radius);
  return builder.arcTo(r, r, 0, shape.largeArcFlag(), shape.sweepFlag(), stop.x, stop.y).build();
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/"/g, "&quot;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/** Standalone SVG document with one stroked `<path>` per entry of `paths`. */
export function toSvgDocument(paths: readonly string[], options: SvgDocumentOptions): string {
  const { viewBox, stroke = "black", strokeWidth = 1, fill = "none" } = options;
  const style = `fill="${escapeAttribute(fill)}" stroke="${escapeAttribute(stroke)}" stroke-width="${strokeWidth}"`;
  const lines = [
    `<svg xmlns="http://www.w3.org/2000/svg" viewBox="${viewBox.join(" ")}">`,
    ...paths.map((d) => `  <path d="${escapeAttribute(d)}" ${style}/>`),
    "</svg>"
  ];
  return lines.join("\n");
}
