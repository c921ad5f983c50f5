import {
  ellipticalArcLength,
  estimateBezierLength,
  reflectControlPoint,
  subdivideSegment,
  svgArcToCenter,
  vectorizeArc,
  vectorizeBulge,
  vectorizeCircle,
  vectorizeCubic,
  vectorizeEllipticalArc,
  vectorizeLine,
  vectorizeQuadratic,
} from '../services/vectorizer.service';
import { DegenerateGeometryError } from '../errors/conversion.errors';
import { Point } from '../models/geometry.types';

function maxGap(points: Point[]): number {
  let gap = 0;
  for (let i = 1; i < points.length; i++) {
    gap = Math.max(gap, Math.hypot(points[i].x - points[i - 1].x, points[i].y - points[i - 1].y));
  }
  return gap;
}

describe('vectorizer', () => {
  describe('vectorizeLine', () => {
    it('should keep consecutive points within the dot spacing', () => {
      const start = { x: 0, y: 0 };
      const end = { x: 10, y: 0 };

      const points = vectorizeLine(start, end, 3);

      // ceil(10 / 3) = 4 segments
      expect(points).toHaveLength(5);
      expect(points[0]).toEqual(start);
      expect(points[points.length - 1]).toEqual(end);
      expect(points[1].x).toBeCloseTo(2.5);
      expect(maxGap(points)).toBeLessThanOrEqual(3);
    });

    it('should keep exact endpoints for diagonal lines', () => {
      const start = { x: 1.5, y: -2 };
      const end = { x: 7.25, y: 9.5 };

      const points = vectorizeLine(start, end, 0.7);

      expect(points[0]).toBe(start);
      expect(points[points.length - 1]).toBe(end);
      expect(maxGap(points)).toBeLessThanOrEqual(0.7 + 1e-9);
    });

    it('should collapse a line shorter than the spacing to its midpoint', () => {
      const points = vectorizeLine({ x: 0, y: 0 }, { x: 1, y: 1 }, 2);

      expect(points).toEqual([{ x: 0.5, y: 0.5 }]);
    });

    it('should keep both endpoints of a line exactly as long as the spacing', () => {
      const points = vectorizeLine({ x: 0, y: 0 }, { x: 2, y: 0 }, 2);

      expect(points).toEqual([{ x: 0, y: 0 }, { x: 2, y: 0 }]);
    });

    it('should reject a non-positive spacing', () => {
      expect(() => vectorizeLine({ x: 0, y: 0 }, { x: 1, y: 0 }, 0)).toThrow(RangeError);
      expect(() => vectorizeLine({ x: 0, y: 0 }, { x: 1, y: 0 }, -1)).toThrow(RangeError);
    });
  });

  describe('subdivideSegment', () => {
    it('should return the single point of a zero-length segment', () => {
      expect(subdivideSegment({ x: 3, y: 4 }, { x: 3, y: 4 }, 1)).toEqual([{ x: 3, y: 4 }]);
    });

    it('should keep both endpoints of a segment shorter than the spacing', () => {
      expect(subdivideSegment({ x: 0, y: 0 }, { x: 1, y: 0 }, 5)).toEqual([
        { x: 0, y: 0 },
        { x: 1, y: 0 },
      ]);
    });
  });

  describe('vectorizeArc', () => {
    it('should sample a quarter arc with at least two segments', () => {
      // length = pi/2 * 1, round(1.57 / 10) = 0 -> 2 segments
      const points = vectorizeArc({ x: 0, y: 0 }, 1, 0, 90, 10);

      expect(points).toHaveLength(3);
      expect(points[0].x).toBeCloseTo(1);
      expect(points[0].y).toBeCloseTo(0);
      expect(points[1].x).toBeCloseTo(Math.SQRT1_2);
      expect(points[1].y).toBeCloseTo(Math.SQRT1_2);
      expect(points[2].x).toBeCloseTo(0);
      expect(points[2].y).toBeCloseTo(1);
    });

    it('should wrap an end angle below the start angle', () => {
      // 270 -> 90 sweeps 180 degrees through 0
      const points = vectorizeArc({ x: 0, y: 0 }, 2, 270, 90, 100);

      expect(points).toHaveLength(3);
      expect(points[1].x).toBeCloseTo(2);
      expect(points[1].y).toBeCloseTo(0);
      expect(points[2].y).toBeCloseTo(2);
    });

    it('should return a single point for a zero sweep', () => {
      const points = vectorizeArc({ x: 1, y: 1 }, 1, 45, 45, 1);

      expect(points).toHaveLength(1);
      expect(points[0].x).toBeCloseTo(1 + Math.SQRT1_2);
      expect(points[0].y).toBeCloseTo(1 + Math.SQRT1_2);
    });

    it('should reject a zero radius', () => {
      expect(() => vectorizeArc({ x: 0, y: 0 }, 0, 0, 90, 1)).toThrow(DegenerateGeometryError);
    });
  });

  describe('vectorizeCircle', () => {
    it('should start and end on the same point', () => {
      const points = vectorizeCircle({ x: 5, y: -3 }, 4, 1);
      const first = points[0];
      const last = points[points.length - 1];

      // circumference 8pi ~ 25.13 -> 25 segments
      expect(points).toHaveLength(26);
      expect(Math.abs(first.x - last.x)).toBeLessThan(1e-6);
      expect(Math.abs(first.y - last.y)).toBeLessThan(1e-6);
    });
  });

  describe('bezier curves', () => {
    it('should estimate length as the mean of control polygon and chord', () => {
      // polygon 3 + 4 = 7, chord 5
      expect(estimateBezierLength([{ x: 0, y: 0 }, { x: 3, y: 0 }, { x: 3, y: 4 }])).toBe(6);
      expect(estimateBezierLength([{ x: 0, y: 0 }])).toBe(0);
    });

    it('should sample a quadratic curve with exact endpoints', () => {
      const p0 = { x: 0, y: 0 };
      const p2 = { x: 4, y: 0 };

      // polygon 2*sqrt(8) ~ 5.657, chord 4 -> ~4.83, round(4.83 / 2) = 2 segments
      const points = vectorizeQuadratic(p0, { x: 2, y: 2 }, p2, 2);

      expect(points).toHaveLength(3);
      expect(points[0]).toBe(p0);
      expect(points[1]).toEqual({ x: 2, y: 1 });
      expect(points[2]).toBe(p2);
    });

    it('should use a single segment for a very short cubic curve', () => {
      const points = vectorizeCubic({ x: 0, y: 0 }, { x: 0.1, y: 0 }, { x: 0.2, y: 0 }, { x: 0.3, y: 0 }, 5);

      expect(points).toEqual([{ x: 0, y: 0 }, { x: 0.3, y: 0 }]);
    });

    it('should evaluate a symmetric cubic at its midpoint', () => {
      // polygon 4 + 4 + 4 = 12, chord 4 -> 8, round(8 / 4) = 2 segments
      const points = vectorizeCubic({ x: 0, y: 0 }, { x: 0, y: 4 }, { x: 4, y: 4 }, { x: 4, y: 0 }, 4);

      expect(points).toHaveLength(3);
      expect(points[1].x).toBeCloseTo(2);
      expect(points[1].y).toBeCloseTo(3);
    });

    it('should mirror the previous control point through the current point', () => {
      expect(reflectControlPoint({ x: 1, y: 2 }, { x: 3, y: 3 })).toEqual({ x: 5, y: 4 });
      expect(reflectControlPoint(undefined, { x: 3, y: 3 })).toEqual({ x: 3, y: 3 });
    });
  });

  describe('elliptical arcs', () => {
    it('should fall back to the end point when a radius is zero', () => {
      const to = { x: 10, y: 5 };

      expect(vectorizeEllipticalArc({ x: 0, y: 0 }, { rx: 0, ry: 3, rotation: 0, largeArc: false, sweep: true, to }, 1))
        .toEqual([to]);
      expect(vectorizeEllipticalArc({ x: 0, y: 0 }, { rx: 3, ry: 0, rotation: 0, largeArc: false, sweep: true, to }, 1))
        .toEqual([to]);
    });

    it('should fall back to the end point when endpoints coincide', () => {
      const to = { x: 2, y: 2 };

      expect(vectorizeEllipticalArc({ x: 2, y: 2 }, { rx: 1, ry: 1, rotation: 0, largeArc: true, sweep: true, to }, 1))
        .toEqual([to]);
    });

    it('should find the center of a semicircle', () => {
      const center = svgArcToCenter(
        { x: 0, y: 0 },
        { rx: 1, ry: 1, rotation: 0, largeArc: false, sweep: true, to: { x: 2, y: 0 } }
      );

      expect(center).not.toBeNull();
      expect(center?.cx).toBeCloseTo(1);
      expect(center?.cy).toBeCloseTo(0);
      expect(center?.deltaTheta).toBeCloseTo(Math.PI);
    });

    it('should scale up radii too small to span the chord', () => {
      const center = svgArcToCenter(
        { x: 0, y: 0 },
        { rx: 0.5, ry: 0.5, rotation: 0, largeArc: false, sweep: true, to: { x: 4, y: 0 } }
      );

      expect(center?.rx).toBeCloseTo(2);
      expect(center?.ry).toBeCloseTo(2);
    });

    it('should sample a circular arc within the spacing', () => {
      const from = { x: 0, y: 0 };
      const to = { x: 2, y: 0 };

      // semicircle of radius 1: length pi, ceil(pi / 0.5) = 7 segments
      const points = vectorizeEllipticalArc(from, { rx: 1, ry: 1, rotation: 0, largeArc: false, sweep: true, to }, 0.5);

      expect(points).toHaveLength(8);
      expect(points[0]).toBe(from);
      expect(points[7]).toBe(to);
      expect(maxGap(points)).toBeLessThanOrEqual(0.5);
      for (const point of points) {
        expect(Math.hypot(point.x - 1, point.y)).toBeCloseTo(1);
      }
    });

    it('should integrate the perimeter of a 2:1 ellipse', () => {
      expect(ellipticalArcLength(2, 1, 0, 2 * Math.PI)).toBeCloseTo(9.688448, 4);
      expect(ellipticalArcLength(2, 1, 0, Math.PI / 2)).toBeCloseTo(2.422112, 4);
      expect(ellipticalArcLength(2, 1, 0, -Math.PI / 2)).toBeCloseTo(2.422112, 4);
    });

    describe.each([
      [false, false],
      [false, true],
      [true, false],
      [true, true],
    ])('rotated ellipse with largeArc=%s sweep=%s', (largeArc, sweep) => {
      const from = { x: 0, y: 0 };
      const arc = { rx: 3, ry: 1.5, rotation: 30, largeArc, sweep, to: { x: 3, y: 1 } };

      it('should keep every point on the ellipse', () => {
        const center = svgArcToCenter(from, arc);
        if (!center) throw new Error('expected a center');
        const cos = Math.cos(center.phi);
        const sin = Math.sin(center.phi);

        const points = vectorizeEllipticalArc(from, arc, 0.25);

        expect(points[0]).toBe(from);
        expect(points[points.length - 1]).toBe(arc.to);
        expect(Math.sign(center.deltaTheta)).toBe(sweep ? 1 : -1);
        for (const point of points) {
          const dx = point.x - center.cx;
          const dy = point.y - center.cy;
          const localX = dx * cos + dy * sin;
          const localY = -dx * sin + dy * cos;
          expect((localX / center.rx) ** 2 + (localY / center.ry) ** 2).toBeCloseTo(1, 6);
        }
      });

      it('should space points evenly within the dot spacing', () => {
        const points = vectorizeEllipticalArc(from, arc, 0.25);

        let minGap = Infinity;
        for (let i = 1; i < points.length; i++) {
          minGap = Math.min(minGap, Math.hypot(points[i].x - points[i - 1].x, points[i].y - points[i - 1].y));
        }
        expect(maxGap(points)).toBeLessThanOrEqual(0.25);
        expect(minGap).toBeGreaterThan(0.2);
      });
    });

    it('should use more points for the large arc than the small one', () => {
      const from = { x: 0, y: 0 };
      const small = vectorizeEllipticalArc(
        from,
        { rx: 3, ry: 1.5, rotation: 30, largeArc: false, sweep: true, to: { x: 3, y: 1 } },
        0.25
      );
      const large = vectorizeEllipticalArc(
        from,
        { rx: 3, ry: 1.5, rotation: 30, largeArc: true, sweep: true, to: { x: 3, y: 1 } },
        0.25
      );

      expect(large.length).toBeGreaterThan(small.length);
    });
  });

  describe('vectorizeBulge', () => {
    it('should pass through (1,1) for bulge +1 from (0,0) to (2,0)', () => {
      // semicircle of length pi, ceil(pi / 1) = 4 segments, index 2 is the apex
      const points = vectorizeBulge({ x: 0, y: 0 }, { x: 2, y: 0 }, 1, 1);

      expect(points).toHaveLength(5);
      expect(points[2].x).toBeCloseTo(1);
      expect(points[2].y).toBeCloseTo(1);
    });

    it('should pass through (1,-1) for bulge -1 from (0,0) to (2,0)', () => {
      const points = vectorizeBulge({ x: 0, y: 0 }, { x: 2, y: 0 }, -1, 1);

      expect(points).toHaveLength(5);
      expect(points[2].x).toBeCloseTo(1);
      expect(points[2].y).toBeCloseTo(-1);
    });

    it('should keep exact endpoints and stay on the circle', () => {
      const start = { x: 0, y: 0 };
      const end = { x: 2, y: 0 };

      const points = vectorizeBulge(start, end, 1, 0.3);

      expect(points[0]).toBe(start);
      expect(points[points.length - 1]).toBe(end);
      for (const point of points) {
        expect(Math.hypot(point.x - 1, point.y)).toBeCloseTo(1);
      }
    });

    it('should treat a zero bulge as a straight segment', () => {
      expect(vectorizeBulge({ x: 0, y: 0 }, { x: 2, y: 0 }, 0, 1)).toEqual([
        { x: 0, y: 0 },
        { x: 1, y: 0 },
        { x: 2, y: 0 },
      ]);
    });

    it('should return the start point for coincident endpoints', () => {
      expect(vectorizeBulge({ x: 1, y: 1 }, { x: 1, y: 1 }, 0.5, 1)).toEqual([{ x: 1, y: 1 }]);
    });
  });
});
