import test from "node:test";
import assert from "node:assert/strict";
import {
  Angle,
  AngleDiff,
  Arc,
  HALF_PI,
  Line,
  PI,
  Point,
  UnsupportedOperationError,
  unwrap,
  type ArcIntersection,
  type ArcIntersectionPoint
} from "../src/index.js";

function near(a: number, b: number, eps = 1e-9) {
  assert.ok(Math.abs(a - b) <= eps, `expected ${a} ~ ${b} (eps=${eps})`);
}

function nearPoint(p: Point, q: Point, eps = 1e-9) {
  assert.ok(p.approxEquals(q, eps), `expected ${p} ~ ${q} (eps=${eps})`);
}

function line(x0: number, y0: number, x1: number, y1: number): Line {
  return unwrap(Line.new(new Point(x0, y0), new Point(x1, y1)));
}

function twoPoints(out: ArcIntersection): [ArcIntersectionPoint, ArcIntersectionPoint] {
  if (out.kind !== "two") assert.fail(`expected two crossings, got ${out.kind}`);
  return out.points;
}

const quarter = new Arc(Point.origin(), 1, Angle.new(0), new AngleDiff(HALF_PI));
const upperHalf = new Arc(Point.origin(), 5, Angle.new(0), new AngleDiff(PI));

test("Arc.new: center from the tangent and the chord", () => {
  const arc = unwrap(Arc.new(new Point(1, 1), new Point(5, 3), Angle.new(PI / 4)));
  nearPoint(arc.center, new Point(6, -4));
  near(arc.radius, Math.sqrt(50));
  near(arc.startAngle().radians(), (3 * PI) / 4);
  near(arc.stopDiff.radians(), 2 * (Math.atan2(2, 4) - PI / 4));
  near(arc.stopAngle().radians(), Math.atan2(7, -1));
  nearPoint(arc.start(), new Point(1, 1));
  nearPoint(arc.stop(), new Point(5, 3));
  assert.equal(arc.sweepFlag(), false);
  assert.equal(arc.largeArcFlag(), false);
});

test("Arc.new: counterclockwise quarter circle", () => {
  const arc = unwrap(Arc.new(new Point(1, 1), new Point(-1, 1), Angle.new((3 * PI) / 4)));
  nearPoint(arc.center, new Point(0, 0));
  near(arc.radius, Math.SQRT2);
  near(arc.stopDiff.radians(), HALF_PI);
  near(arc.begin(), (PI / 4) * Math.SQRT2);
  near(arc.end(), ((3 * PI) / 4) * Math.SQRT2);
  near(arc.length(), (Math.SQRT2 * PI) / 2);
  assert.equal(arc.sweepFlag(), true);
});

test("Arc.new: sweeps beyond a half circle", () => {
  const arc = unwrap(Arc.new(new Point(1, 0), new Point(0, 1), Angle.new(3 * HALF_PI)));
  nearPoint(arc.center, new Point(0, 0));
  near(arc.radius, 1);
  near(arc.stopDiff.radians(), -3 * HALF_PI);
  nearPoint(arc.stop(), new Point(0, 1));
  assert.equal(arc.largeArcFlag(), true);
  assert.equal(arc.sweepFlag(), false);
});

test("Arc.new: degenerate inputs fail", () => {
  const same = Arc.new(new Point(1, 1), new Point(1, 1), Angle.new(0));
  assert.equal(same.ok, false);

  const straight = Arc.new(new Point(0, 0), new Point(2, 0), Angle.new(0));
  assert.equal(straight.ok, false);
  if (!straight.ok) assert.equal(straight.error.message, "Undefinable circular arc");
});

test("Arc.fromCenter: stop must lie on the circle", () => {
  const arc = unwrap(Arc.fromCenter(Point.origin(), new Point(1, 0), new Point(0, 1)));
  near(arc.radius, 1);
  near(arc.startAngle().radians(), 0);
  near(arc.stopDiff.radians(), HALF_PI);

  assert.equal(Arc.fromCenter(Point.origin(), new Point(1, 0), new Point(0, 2)).ok, false);
  assert.equal(Arc.fromCenter(Point.origin(), Point.origin(), Point.origin()).ok, false);
  assert.equal(Arc.fromCenter(Point.origin(), new Point(1, 0), new Point(0, 1.1), { distance: 0.2 }).ok, true);
});

test("Arc: parametrisation by arc length", () => {
  nearPoint(quarter.apply(PI / 4), new Point(Math.SQRT1_2, Math.SQRT1_2));
  assert.equal(quarter.applyBounded(2), undefined);
  assert.ok(quarter.applyBounded(1));
  near(quarter.signedDistance(new Point(0, 3)), HALF_PI);
  nearPoint(quarter.applyAngle(Angle.new(PI)), new Point(-1, 0));

  const dot = new Arc(new Point(2, 3), 0, Angle.new(0), new AngleDiff(1));
  assert.ok(dot.apply(1).equals(new Point(2, 3)));
});

test("Arc.containsAngle: signed sweep", () => {
  assert.equal(quarter.containsAngle(Angle.new(PI / 4)), true);
  assert.equal(quarter.containsAngle(Angle.new(0)), true);
  assert.equal(quarter.containsAngle(Angle.new(HALF_PI)), true);
  assert.equal(quarter.containsAngle(Angle.new(PI)), false);

  const clockwise = new Arc(Point.origin(), 1, Angle.new(HALF_PI), new AngleDiff(-HALF_PI));
  assert.equal(clockwise.containsAngle(Angle.new(PI / 4)), true);
  assert.equal(clockwise.containsAngle(Angle.new((3 * PI) / 4)), false);
});

test("Arc.offset: inset past the center flips the signed lengths", () => {
  const arc = unwrap(Arc.new(new Point(1, 1), new Point(-1, 1), Angle.new((3 * PI) / 4)));
  const inset = arc.offset(-2 * Math.SQRT2);
  near(inset.radius, -Math.SQRT2);
  assert.ok(inset.end() < inset.begin());
  near(inset.length(), (-Math.SQRT2 * PI) / 2);
  nearPoint(inset.start(), new Point(-1, -1));

  near(arc.offset(1).radius, Math.SQRT2 + 1);
});

test("Arc.controlPoint / curveSize", () => {
  const control = quarter.controlPoint();
  assert.ok(control);
  nearPoint(control, new Point(1, 1));
  const size = quarter.curveSize();
  assert.ok(size !== null);
  near(size, 1);

  assert.equal(upperHalf.controlPoint(), null);
  assert.equal(upperHalf.curveSize(), null);
});

test("Arc.intersect: secant through both bounds", () => {
  const [p1, p2] = twoPoints(upperHalf.intersect(line(-10, 3, 10, 3)));
  assert.equal(p1.kind, "inBounds");
  assert.equal(p2.kind, "inBounds");
  nearPoint(p1.point, new Point(4, 3));
  nearPoint(p2.point, new Point(-4, 3));
});

test("Arc.intersect: one crossing misses the segment", () => {
  const [p1, p2] = twoPoints(upperHalf.intersect(line(0, 3, 10, 3)));
  assert.equal(p1.kind, "inBounds");
  assert.equal(p2.kind, "inArcBounds");
  nearPoint(p2.point, new Point(-4, 3));
});

test("Arc.intersect: crossings on the missing half of the circle", () => {
  const [p1, p2] = twoPoints(upperHalf.intersect(line(-10, -3, 10, -3)));
  assert.equal(p1.kind, "inLineBounds");
  assert.equal(p2.kind, "inLineBounds");

  const [q1, q2] = twoPoints(upperHalf.intersect(line(20, -3, 30, -3)));
  assert.equal(q1.kind, "outOfBounds");
  assert.equal(q2.kind, "outOfBounds");
});

test("Arc.intersect: tangent and miss", () => {
  const tangent = upperHalf.intersect(line(-10, 5, 10, 5));
  assert.equal(tangent.kind, "one");
  if (tangent.kind === "one") {
    assert.equal(tangent.point.kind, "inBounds");
    nearPoint(tangent.point.point, new Point(0, 5));
  }

  assert.equal(upperHalf.intersect(line(-10, 6, 10, 6)).kind, "none");
});

test("Arc.intersectArc is not supported", () => {
  assert.throws(() => quarter.intersectArc(upperHalf), UnsupportedOperationError);
});
