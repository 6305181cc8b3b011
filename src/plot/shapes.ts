import type { Pos2, Rect } from './point';

/**
 * Fully transparent color, the default for strokes and fills.
 */
export const TRANSPARENT = 'rgba(0, 0, 0, 0)';

export interface Stroke {
	width: number;
	/** Any CSS color accepted by `parseColor`. */
	color: string;
}

export interface RectShape {
	kind: 'rect';
	rect: Rect;
	/** Corner radius in pixels; 0 draws square corners. */
	rounding: number;
	fill: string;
	stroke: Stroke;
}

export interface LineSegmentShape {
	kind: 'lineSegment';
	points: [Pos2, Pos2];
	stroke: Stroke;
}

export interface TextShape {
	kind: 'text';
	pos: Pos2;
	anchor: 'leftBottom';
	text: string;
	color: string;
	font: string;
}

/**
 * A drawable primitive. Plot items only ever append these to a list; the
 * painter turns the list into canvas calls.
 */
export type Shape = RectShape | LineSegmentShape | TextShape;

export function rectShape(rect: Rect, rounding: number, fill: string, stroke: Stroke): RectShape {
	return { kind: 'rect', rect, rounding, fill, stroke };
}

export function lineSegment(points: [Pos2, Pos2], stroke: Stroke): LineSegmentShape {
	return { kind: 'lineSegment', points, stroke };
}

export function textShape(pos: Pos2, text: string, color: string, font: string): TextShape {
	return { kind: 'text', pos, anchor: 'leftBottom', text, color, font };
}
