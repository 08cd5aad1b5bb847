/**
 * Length conversions into PDF user space units.
 */

import { type PageBox, topOf } from "./page-size";

/** Points per inch */
export const POINTS_PER_INCH = 72;

/** Centimetres per inch */
export const CM_PER_INCH = 2.54;

export function inchesToPoints(inches: number): number {
  return inches * POINTS_PER_INCH;
}

export function cmToPoints(cm: number): number {
  return (cm / CM_PER_INCH) * POINTS_PER_INCH;
}

/**
 * Convert an offset measured from the top-left corner of a page into a
 * bottom-left point position.
 *
 * @example
 * ```ts
 * // 1 inch from the left, 1 inch from the top of a letter page
 * fromTopLeft({ x: 0, y: 0, width: 612, height: 792 }, 72, 72); // { x: 72, y: 720 }
 * ```
 */
export function fromTopLeft(
  box: PageBox,
  fromLeft: number,
  fromTop: number,
): { x: number; y: number } {
  return {
    x: box.x + fromLeft,
    y: topOf(box) - fromTop,
  };
}
