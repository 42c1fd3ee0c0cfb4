import type { AssessmentItem, Point, PointsData } from "../../../shared/schema.js";
import { COORDINATE_BOUND, POINT_LABELS } from "../constants.js";
import { placementFor } from "../curriculum.js";
import { ensureFive } from "../options.js";
import type { RandomSource } from "../random.js";

function randomCoordinate(random: RandomSource): number {
  return random.int(-COORDINATE_BOUND, COORDINATE_BOUND);
}

/**
 * Five points with pairwise distinct x-coordinates, so exactly one of them
 * matches the target's x. The first point is the target.
 */
function plotPoints(random: RandomSource): Point[] {
  const target: Point = [randomCoordinate(random), randomCoordinate(random)];
  const points: Point[] = [target];
  const usedX = new Set([target[0]]);

  while (points.length < POINT_LABELS.length) {
    const x = randomCoordinate(random);
    if (usedX.has(x)) continue;
    usedX.add(x);
    points.push([x, randomCoordinate(random)]);
  }

  return points;
}

export function generateCoordinateItem(difficulty: string, random: RandomSource): AssessmentItem {
  const points = plotPoints(random);
  const target = points[0];
  const shuffled = random.shuffle(points);

  const targetPosition = shuffled.indexOf(target);
  const answer = POINT_LABELS[targetPosition];
  const options = ensureFive(POINT_LABELS, random);
  const correctIndex = options.indexOf(answer);

  const pointsData: PointsData = {};
  shuffled.forEach((point, i) => {
    pointsData[POINT_LABELS[i]] = point;
  });

  const [x, y] = target;
  return {
    question: `Which point on the coordinate plane has an $x$-coordinate of ${x}?`,
    options,
    correctIndex,
    explanation: `Point ${answer} is at $(${x}, ${y})$ so its $x$-coordinate is ${x}.`,
    ...placementFor("coordinate"),
    difficulty,
    hasImage: true,
    pointsData,
  };
}
