import { Path, PathPoint } from '../models/geometry.types';
import { ReadonlyWelderConfig } from '../config/welder.config';
import { subdivideSegment } from './vectorizer.service';

/**
 * Number of passes needed to go from the initial spacing down to the final
 * one by halving: the first pass welds every 2^(n-1)th point.
 */
export function passCount(initialSpacing: number, finalSpacing: number): number {
  if (!(initialSpacing > finalSpacing)) {
    return 1;
  }
  return Math.floor(Math.log2(initialSpacing / finalSpacing) + 1e-9) + 1;
}

/**
 * Resample a path at the final spacing and spread the points over passes.
 * Pass 1 takes every 2^(passes-1)th point; each later pass fills the gaps
 * halfway between the points already welded.
 */
export function generateMultipassPoints(points: PathPoint[], finalSpacing: number, passes: number): PathPoint[][] {
  if (passes <= 1 || points.length < 2) {
    return [points];
  }

  const resampled: PathPoint[] = [points[0]];
  for (let i = 1; i < points.length; i++) {
    const start = points[i - 1];
    const end = points[i];
    const segment = subdivideSegment(start, end, finalSpacing);
    if (segment.length < 2) continue;

    for (let j = 1; j < segment.length - 1; j++) {
      const { x, y } = segment[j];
      resampled.push(start.operation === undefined ? { x, y } : { x, y, operation: start.operation });
    }
    resampled.push(end);
  }

  const result: PathPoint[][] = [];
  const firstStep = 2 ** (passes - 1);
  result.push(resampled.filter((_, index) => index % firstStep === 0));

  for (let pass = 1; pass < passes; pass++) {
    const step = 2 ** (passes - 1 - pass);
    const passPoints: PathPoint[] = [];
    for (let index = step; index < resampled.length; index += step * 2) {
      passPoints.push(resampled[index]);
    }
    result.push(passPoints);
  }

  return result;
}

/**
 * Split weld paths into one path per pass when multipass welding is
 * enabled. Stop and pipette paths are left as they are.
 */
export function expandWeldPasses(paths: Path[], config: ReadonlyWelderConfig): Path[] {
  if (!config.sequence.multipassEnabled) {
    return paths;
  }

  const finalSpacing = config.sequence.dotSpacing;
  const expanded: Path[] = [];

  for (const path of paths) {
    if (path.operation !== 'normal' && path.operation !== 'frangible') {
      expanded.push(path);
      continue;
    }

    const settings = path.operation === 'normal' ? config.normalWelds : config.frangibleWelds;
    const passes = generateMultipassPoints(
      path.points,
      finalSpacing,
      passCount(settings.initialDotSpacing, finalSpacing)
    ).filter(points => points.length > 0);

    if (passes.length === 1) {
      expanded.push(path);
      continue;
    }

    console.log(
      `[Multipass] ${path.id}: ${passes.reduce((sum, points) => sum + points.length, 0)} points over ${passes.length} passes`
    );
    passes.forEach((points, index) => {
      expanded.push({ id: `${path.id}_pass${index + 1}`, operation: path.operation, points, pass: index + 1 });
    });
  }

  return expanded;
}
