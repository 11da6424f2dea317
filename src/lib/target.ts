import type { Detection, SelectedTarget, TargetFilter } from "../types/index";

/**
 * Pick the largest detection that passes the class and size filter.
 * Boxes are truncated to whole pixels first. A later detection must be
 * strictly larger to replace the current best, so ties keep the earliest.
 * Boxes that collapse to zero area after truncation never qualify.
 */
export function selectTarget(
  detections: readonly Detection[],
  filter: TargetFilter
): SelectedTarget | null {
  let best: SelectedTarget | null = null;

  for (const det of detections) {
    if (!filter.allowedClassIds.has(det.classId)) continue;

    const x1 = Math.trunc(det.bbox.x1);
    const y1 = Math.trunc(det.bbox.y1);
    const x2 = Math.trunc(det.bbox.x2);
    const y2 = Math.trunc(det.bbox.y2);
    const w = x2 - x1;
    const h = y2 - y1;
    if (w < filter.minWidth || h < filter.minHeight) continue;

    const area = w * h;
    if (area <= (best?.area ?? 0)) continue;

    best = {
      centerX: (x1 + x2) / 2,
      centerY: (y1 + y2) / 2,
      area,
      classId: det.classId,
    };
  }

  return best;
}
