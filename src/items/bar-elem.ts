import { highlightedColor } from '../helpers/colors';
import { formatValue, valueDecimals } from '../helpers/formatting';
import { Orientation, type PlotPoint, pointAt } from '../plot/point';
import { type PlotConfig, addRulersAndText } from '../plot/rulers';
import { type Shape, type Stroke, TRANSPARENT, rectShape } from '../plot/shapes';
import type { ScreenTransform } from '../plot/transform';
import { type RectElement, defaultArgumentsWithRuler } from './rect-element';

export interface BarOptions {
	/** Where the bar starts on the value axis; 0 when omitted. */
	baseOffset: number | undefined;
	/** Full width of the bar, in argument units. */
	barWidth: number;
	name: string;
	orientation: Orientation;
	stroke: Stroke;
	fill: string;
}

export const barDefaultOptions: BarOptions = {
	baseOffset: undefined,
	barWidth: 0.5,
	name: '',
	orientation: Orientation.Vertical,
	stroke: { width: 1, color: TRANSPARENT },
	fill: TRANSPARENT,
};

// Sign bit test: -0 counts as negative, NaN as positive
function isSignPositive(value: number): boolean {
	return value > 0 || Object.is(value, 0) || Number.isNaN(value);
}

/**
 * A single histogram bar, such as the volume of one time bucket, drawn from
 * `baseOffset` to `baseOffset + value`.
 */
export class Bar implements RectElement {
	readonly kind = 'bar';

	readonly argument: number;
	readonly value: number;
	readonly baseOffset: number | undefined;
	readonly barWidth: number;
	readonly stroke: Stroke;
	readonly fill: string;
	private readonly _name: string;
	private readonly _orientation: Orientation;

	constructor(argument: number, value: number, options?: Partial<BarOptions>) {
		const resolved = { ...barDefaultOptions, ...options };
		this.argument = argument;
		this.value = value;
		this.baseOffset = resolved.baseOffset;
		this.barWidth = resolved.barWidth;
		this.stroke = resolved.stroke;
		this.fill = resolved.fill;
		this._name = resolved.name;
		this._orientation = resolved.orientation;
	}

	options(): BarOptions {
		return {
			baseOffset: this.baseOffset,
			barWidth: this.barWidth,
			name: this._name,
			orientation: this._orientation,
			stroke: this.stroke,
			fill: this.fill,
		};
	}

	private _with(patch: Partial<BarOptions>): Bar {
		return new Bar(this.argument, this.value, { ...this.options(), ...patch });
	}

	withArgument(argument: number): Bar {
		return new Bar(argument, this.value, this.options());
	}

	withName(name: string): Bar {
		return this._with({ name });
	}

	withBaseOffset(baseOffset: number): Bar {
		return this._with({ baseOffset });
	}

	withBarWidth(barWidth: number): Bar {
		return this._with({ barWidth });
	}

	withOrientation(orientation: Orientation): Bar {
		return this._with({ orientation });
	}

	withStroke(stroke: Stroke): Bar {
		return this._with({ stroke });
	}

	withFill(fill: string): Bar {
		return this._with({ fill });
	}

	lower(): number {
		if (isSignPositive(this.value)) {
			return this.baseOffset ?? 0;
		}
		return this.baseOffset === undefined ? this.value : this.baseOffset + this.value;
	}

	upper(): number {
		if (isSignPositive(this.value)) {
			return this.baseOffset === undefined ? this.value : this.baseOffset + this.value;
		}
		return this.baseOffset ?? 0;
	}

	addShapes(transform: ScreenTransform, highlighted: boolean, shapes: Shape[]): void {
		const [stroke, fill] = highlighted
			? highlightedColor(this.stroke, this.fill)
			: [this.stroke, this.fill];

		const rect = transform.rectFromValues(this.boundsMin(), this.boundsMax());
		shapes.push(rectShape(rect, 0, fill, stroke));
	}

	addRulersAndText(plot: PlotConfig, shapes: Shape[], format?: (elem: Bar) => string): void {
		addRulersAndText(this, plot, format?.(this), shapes);
	}

	name(): string {
		return this._name;
	}

	boundsMin(): PlotPoint {
		return this._pointAt(this.argument - this.barWidth / 2, this.lower());
	}

	boundsMax(): PlotPoint {
		return this._pointAt(this.argument + this.barWidth / 2, this.upper());
	}

	valuesWithRuler(): PlotPoint[] {
		return [this._pointAt(this.argument, (this.baseOffset ?? 0) + this.value)];
	}

	argumentsWithRuler(): PlotPoint[] {
		return defaultArgumentsWithRuler(this);
	}

	orientation(): Orientation {
		return this._orientation;
	}

	cornerValue(): PlotPoint {
		return this._pointAt(this.argument, this.value);
	}

	defaultValuesFormat(transform: ScreenTransform): string {
		const [scaleX, scaleY] = transform.dvalueDpos();
		const scale = this._orientation === Orientation.Vertical ? scaleY : scaleX;
		return `\n${formatValue(this.value, valueDecimals(scale))}`;
	}

	private _pointAt(argument: number, value: number): PlotPoint {
		return pointAt(this._orientation, argument, value);
	}
}
