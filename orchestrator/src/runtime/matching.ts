import { FindSpec, Region } from "../types/game";
import { BoundingBox, DetectedElement } from "../types/session";

function normalize(text: string): string {
  return text.trim().toLowerCase();
}

export function centerOf(bbox: BoundingBox): { x: number; y: number } {
  return {
    x: Math.round(bbox.x + bbox.width / 2),
    y: Math.round(bbox.y + bbox.height / 2),
  };
}

function insideRegion(bbox: BoundingBox, region: Region): boolean {
  const { x, y } = centerOf(bbox);
  return x >= region.x && x <= region.x + region.width && y >= region.y && y <= region.y + region.height;
}

export function matchesFind(element: DetectedElement, find: FindSpec): boolean {
  if (find.type !== "any" && normalize(element.type) !== normalize(find.type)) {
    return false;
  }
  if (find.region && !insideRegion(element.bbox, find.region)) {
    return false;
  }
  const expected = normalize(find.text);
  const actual = normalize(element.text);
  return find.match === "exact" ? actual === expected : actual.includes(expected);
}

/** First element, in detection order, that satisfies `find`. */
export function findMatch(elements: DetectedElement[], find: FindSpec): DetectedElement | undefined {
  return elements.find((element) => matchesFind(element, find));
}

export function describeFind(find: FindSpec): string {
  return `${find.type} "${find.text}" (${find.match})`;
}
