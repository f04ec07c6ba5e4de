import test from "node:test";
import assert from "node:assert/strict";
import {
  Angle,
  AngleDiff,
  Arc,
  Line,
  PI,
  Point,
  UnsupportedOperationError,
  intersect,
  offset,
  unwrap,
  type Segment
} from "../src/index.js";

function nearPoint(p: Point, q: Point, eps = 1e-9) {
  assert.ok(p.approxEquals(q, eps), `expected ${p} ~ ${q} (eps=${eps})`);
}

const horizontal = unwrap(Line.new(new Point(-10, 3), new Point(10, 3)));
const diagonal = unwrap(Line.new(new Point(0, 0), new Point(10, 10)));
const upperHalf = new Arc(Point.origin(), 5, Angle.new(0), new AngleDiff(PI));

test("intersect: line-line", () => {
  const out = intersect(horizontal, diagonal);
  assert.equal(out.kind, "onePoint");
  if (out.kind === "onePoint") nearPoint(out.point, new Point(3, 3));
});

test("intersect: line-arc and arc-line agree", () => {
  const a = intersect(horizontal, upperHalf);
  const b = intersect(upperHalf, horizontal);
  assert.equal(a.kind, "two");
  assert.equal(b.kind, "two");
  if (a.kind === "two" && b.kind === "two") {
    nearPoint(a.points[0].point, b.points[0].point);
    nearPoint(a.points[1].point, b.points[1].point);
  }
});

test("intersect: segments dispatch on their kind", () => {
  const segments: Segment[] = [horizontal, upperHalf];
  const kinds = segments.map((s) => intersect(diagonal, s).kind);
  assert.deepEqual(kinds, ["onePoint", "two"]);
});

test("intersect: arc-arc is not supported", () => {
  assert.throws(() => intersect(upperHalf, upperHalf), UnsupportedOperationError);
});

test("offset: delegates to the shape", () => {
  nearPoint(offset(horizontal, 1).start(), new Point(-10, 2));
  assert.equal(offset(upperHalf, -1).radius, 4);
});
