import { type PlotBounds, type PlotPoint, type Pos2, type Rect, rectFromTwoPos, rectHeight, rectWidth } from './point';

/**
 * Maps data-space values to screen positions for the current pan/zoom.
 */
export interface ScreenTransform {
	/** Screen rectangle spanned by two data-space corners, in any order. */
	rectFromValues(a: PlotPoint, b: PlotPoint): Rect;
	positionFromPoint(point: PlotPoint): Pos2;
	/** Data units per screen pixel along x and y. Signed. */
	dvalueDpos(): [number, number];
	/** The screen area the plot is drawn into. */
	frame(): Rect;
}

export interface LinearTransformOptions {
	invertX: boolean;
	invertY: boolean;
}

const defaultLinearTransformOptions: LinearTransformOptions = {
	invertX: false,
	invertY: false,
};

function remap(value: number, fromMin: number, fromMax: number, toMin: number, toMax: number): number {
	return toMin + ((value - fromMin) / (fromMax - fromMin)) * (toMax - toMin);
}

/**
 * Linear transform from a data-space box onto a screen frame. Screen y grows
 * downwards, so the data maximum lands on the top edge of the frame unless
 * `invertY` is set.
 */
export class LinearScreenTransform implements ScreenTransform {
	private readonly _frame: Rect;
	private readonly _bounds: PlotBounds;
	private readonly _options: LinearTransformOptions;

	constructor(frame: Rect, bounds: PlotBounds, options?: Partial<LinearTransformOptions>) {
		this._frame = frame;
		this._bounds = bounds;
		this._options = {
			...defaultLinearTransformOptions,
			...options,
		};
	}

	frame(): Rect {
		return this._frame;
	}

	bounds(): PlotBounds {
		return this._bounds;
	}

	positionFromPoint(point: PlotPoint): Pos2 {
		const { min, max } = this._bounds;
		const [left, right] = this._options.invertX
			? [this._frame.max.x, this._frame.min.x]
			: [this._frame.min.x, this._frame.max.x];
		const [bottom, top] = this._options.invertY
			? [this._frame.min.y, this._frame.max.y]
			: [this._frame.max.y, this._frame.min.y];

		return {
			x: remap(point.x, min.x, max.x, left, right),
			y: remap(point.y, min.y, max.y, bottom, top),
		};
	}

	rectFromValues(a: PlotPoint, b: PlotPoint): Rect {
		return rectFromTwoPos(this.positionFromPoint(a), this.positionFromPoint(b));
	}

	dvalueDpos(): [number, number] {
		const { min, max } = this._bounds;
		const dx = (max.x - min.x) / rectWidth(this._frame);
		const dy = -(max.y - min.y) / rectHeight(this._frame);
		return [
			this._options.invertX ? -dx : dx,
			this._options.invertY ? -dy : dy,
		];
	}
}
