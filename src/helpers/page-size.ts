/**
 * Page box utilities.
 */

/** A page rectangle in points (1 point = 1/72 inch), origin bottom-left. */
export interface PageBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Box used for pages that carry no usable /MediaBox (US Letter).
 */
export const FALLBACK_PAGE_BOX: Readonly<PageBox> = {
  x: 0,
  y: 0,
  width: 612,
  height: 792,
};

/**
 * Top edge of a box (largest y).
 */
export function topOf(box: PageBox): number {
  return box.y + box.height;
}
