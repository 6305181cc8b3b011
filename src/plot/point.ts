/**
 * A point in data space (argument/time on x, price or quantity on y for
 * vertical items).
 */
export interface PlotPoint {
	x: number;
	y: number;
}

/**
 * A point in screen (canvas) space.
 */
export interface Pos2 {
	x: number;
	y: number;
}

/**
 * Screen rectangle. Built through `rectFromTwoPos`, so `min` is always the
 * top-left and `max` the bottom-right corner.
 */
export interface Rect {
	min: Pos2;
	max: Pos2;
}

/**
 * Axis-aligned box in data space.
 */
export interface PlotBounds {
	min: PlotPoint;
	max: PlotPoint;
}

/**
 * Enumeration for the direction a chart item grows in.
 */
export enum Orientation {
	/** Argument on the x axis, value on the y axis. */
	Vertical = 'Vertical',
	/** Value on the x axis, argument on the y axis. */
	Horizontal = 'Horizontal',
}

export function pointAt(
	orientation: Orientation,
	argument: number,
	value: number
): PlotPoint {
	switch (orientation) {
		case Orientation.Vertical:
			return { x: argument, y: value };
		case Orientation.Horizontal:
			return { x: value, y: argument };
	}
}

export function rectFromTwoPos(a: Pos2, b: Pos2): Rect {
	return {
		min: { x: Math.min(a.x, b.x), y: Math.min(a.y, b.y) },
		max: { x: Math.max(a.x, b.x), y: Math.max(a.y, b.y) },
	};
}

export function rectWidth(rect: Rect): number {
	return rect.max.x - rect.min.x;
}

export function rectHeight(rect: Rect): number {
	return rect.max.y - rect.min.y;
}

/**
 * Squared distance from `pos` to the closest point of `rect`; 0 when inside.
 */
export function rectDistanceSq(rect: Rect, pos: Pos2): number {
	const dx = Math.max(rect.min.x - pos.x, 0, pos.x - rect.max.x);
	const dy = Math.max(rect.min.y - pos.y, 0, pos.y - rect.max.y);
	return dx * dx + dy * dy;
}

/**
 * Bounds that contain nothing; merging anything into them yields that thing.
 */
export function emptyBounds(): PlotBounds {
	return {
		min: { x: Infinity, y: Infinity },
		max: { x: -Infinity, y: -Infinity },
	};
}

export function mergeBounds(a: PlotBounds, b: PlotBounds): PlotBounds {
	return {
		min: { x: Math.min(a.min.x, b.min.x), y: Math.min(a.min.y, b.min.y) },
		max: { x: Math.max(a.max.x, b.max.x), y: Math.max(a.max.y, b.max.y) },
	};
}

export function boundsCenter(bounds: PlotBounds): PlotPoint {
	return {
		x: (bounds.min.x + bounds.max.x) / 2,
		y: (bounds.min.y + bounds.max.y) / 2,
	};
}
