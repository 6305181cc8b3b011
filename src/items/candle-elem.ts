import { highlightedColor } from '../helpers/colors';
import { formatValue, valueDecimals } from '../helpers/formatting';
import { Orientation, type PlotPoint, pointAt } from '../plot/point';
import { type PlotConfig, addRulersAndText } from '../plot/rulers';
import { type Shape, type Stroke, TRANSPARENT, lineSegment, rectShape } from '../plot/shapes';
import type { ScreenTransform } from '../plot/transform';
import { type RectElement, defaultArgumentsWithRuler } from './rect-element';

/**
 * One OHLCV data point. Values are stored as given; `low <= open, close <=
 * high` is expected but never checked.
 */
export class Candle {
	constructor(
		readonly open: number,
		readonly high: number,
		readonly low: number,
		readonly close: number,
		readonly volume: number
	) {}
}

export interface CandleElemOptions {
	/** Position along the time/category axis. */
	x: number;
	/** Full width of the body, in x units. */
	candleWidth: number;
	/** Width reserved around the whisker when computing bounds, in x units. */
	whiskerWidth: number;
	stroke: Stroke;
	fill: string;
}

export const candleElemDefaultOptions: CandleElemOptions = {
	x: 0,
	candleWidth: 0.25,
	whiskerWidth: 0.15,
	stroke: { width: 1, color: TRANSPARENT },
	fill: TRANSPARENT,
};

/**
 * A positioned candle plus its visual style. Immutable: every `with*` call
 * returns a new element.
 */
export class CandleElem implements RectElement {
	readonly kind = 'candle';

	readonly candle: Candle;
	readonly x: number;
	readonly candleWidth: number;
	readonly whiskerWidth: number;
	readonly stroke: Stroke;
	readonly fill: string;

	constructor(candle: Candle, options?: Partial<CandleElemOptions>) {
		const resolved = { ...candleElemDefaultOptions, ...options };
		this.candle = candle;
		this.x = resolved.x;
		this.candleWidth = resolved.candleWidth;
		this.whiskerWidth = resolved.whiskerWidth;
		this.stroke = resolved.stroke;
		this.fill = resolved.fill;
	}

	options(): CandleElemOptions {
		return {
			x: this.x,
			candleWidth: this.candleWidth,
			whiskerWidth: this.whiskerWidth,
			stroke: this.stroke,
			fill: this.fill,
		};
	}

	private _with(patch: Partial<CandleElemOptions>): CandleElem {
		return new CandleElem(this.candle, { ...this.options(), ...patch });
	}

	withX(x: number): CandleElem {
		return this._with({ x });
	}

	withStroke(stroke: Stroke): CandleElem {
		return this._with({ stroke });
	}

	withFill(fill: string): CandleElem {
		return this._with({ fill });
	}

	withCandleWidth(candleWidth: number): CandleElem {
		return this._with({ candleWidth });
	}

	withWhiskerWidth(whiskerWidth: number): CandleElem {
		return this._with({ whiskerWidth });
	}

	/**
	 * Appends the body rectangle and the low-high whisker, in that order.
	 * A bearish candle maps open above close; the rect is normalized either way.
	 */
	addShapes(transform: ScreenTransform, highlighted: boolean, shapes: Shape[]): void {
		const [stroke, fill] = highlighted
			? highlightedColor(this.stroke, this.fill)
			: [this.stroke, this.fill];

		const rect = transform.rectFromValues(
			this._pointAt(this.x - this.candleWidth / 2, this.candle.open),
			this._pointAt(this.x + this.candleWidth / 2, this.candle.close)
		);
		shapes.push(rectShape(rect, 0, fill, stroke));

		const whisker = lineSegment(
			[
				transform.positionFromPoint(this._pointAt(this.x, this.candle.low)),
				transform.positionFromPoint(this._pointAt(this.x, this.candle.high)),
			],
			stroke
		);
		shapes.push(whisker);
	}

	/**
	 * Hover overlay for this candle. `format` is the owning plot's element
	 * formatter, already bound to that plot; without it the ruler routine
	 * falls back to the default values text.
	 */
	addRulersAndText(
		plot: PlotConfig,
		shapes: Shape[],
		format?: (elem: CandleElem) => string
	): void {
		const text = format?.(this);
		addRulersAndText(this, plot, text, shapes);
	}

	name(): string {
		return '';
	}

	boundsMin(): PlotPoint {
		const x = this.x - Math.max(this.candleWidth, this.whiskerWidth) / 2;
		return this._pointAt(x, this.candle.low);
	}

	boundsMax(): PlotPoint {
		const x = this.x + Math.max(this.candleWidth, this.whiskerWidth) / 2;
		return this._pointAt(x, this.candle.high);
	}

	valuesWithRuler(): PlotPoint[] {
		const { open, high, low, close, volume } = this.candle;
		return [open, high, low, close, volume].map((value) => this._pointAt(this.x, value));
	}

	argumentsWithRuler(): PlotPoint[] {
		return defaultArgumentsWithRuler(this);
	}

	orientation(): Orientation {
		return Orientation.Vertical;
	}

	cornerValue(): PlotPoint {
		return this._pointAt(this.x, this.candle.high);
	}

	defaultValuesFormat(transform: ScreenTransform): string {
		const decimals = valueDecimals(transform.dvalueDpos()[1]);
		const { open, high, low, close, volume } = this.candle;
		return (
			`\nOpen = ${formatValue(open, decimals)}` +
			`\nHigh = ${formatValue(high, decimals)}` +
			`\nLow = ${formatValue(low, decimals)}` +
			`\nClose = ${formatValue(close, decimals)}` +
			`\nVolume = ${formatValue(volume, decimals)}`
		);
	}

	private _pointAt(argument: number, value: number): PlotPoint {
		return pointAt(this.orientation(), argument, value);
	}
}
