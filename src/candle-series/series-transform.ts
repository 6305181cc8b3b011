import { type PlotPoint, type Pos2, type Rect, rectFromTwoPos } from '../plot/point';
import type { ScreenTransform } from '../plot/transform';

/**
 * Price to media coordinate conversion, as lightweight-charts hands it to a
 * pane renderer. `null` means the price cannot be placed.
 */
export type PriceToCoordinate = (price: number) => number | null;

export interface SeriesTransformParams {
	/** Logical index of the reference bar. */
	firstIndex: number;
	/** Media x of the reference bar. */
	firstX: number;
	barSpacing: number;
	priceToCoordinate: PriceToCoordinate;
	/** Two distinct prices the vertical scale is measured between. */
	referencePrices: [number, number];
	horizontalPixelRatio: number;
	verticalPixelRatio: number;
	bitmapSize: { width: number; height: number };
}

/**
 * Screen transform of a series pane, in bitmap coordinates. Data x is the
 * logical bar index, data y the price.
 */
export class SeriesScreenTransform implements ScreenTransform {
	private readonly _params: SeriesTransformParams;

	constructor(params: SeriesTransformParams) {
		this._params = params;
	}

	private _y(price: number): number {
		return (this._params.priceToCoordinate(price) ?? 0) * this._params.verticalPixelRatio;
	}

	positionFromPoint(point: PlotPoint): Pos2 {
		const { firstIndex, firstX, barSpacing, horizontalPixelRatio } = this._params;
		return {
			x: (firstX + (point.x - firstIndex) * barSpacing) * horizontalPixelRatio,
			y: this._y(point.y),
		};
	}

	rectFromValues(a: PlotPoint, b: PlotPoint): Rect {
		return rectFromTwoPos(this.positionFromPoint(a), this.positionFromPoint(b));
	}

	dvalueDpos(): [number, number] {
		const { barSpacing, horizontalPixelRatio, referencePrices } = this._params;
		const [p0, p1] = referencePrices;
		return [1 / (barSpacing * horizontalPixelRatio), (p1 - p0) / (this._y(p1) - this._y(p0))];
	}

	frame(): Rect {
		const { width, height } = this._params.bitmapSize;
		return { min: { x: 0, y: 0 }, max: { x: width, y: height } };
	}
}
