import { setOpacity } from '../helpers/colors';
import { type PlotBounds, type Pos2, emptyBounds, mergeBounds, rectDistanceSq } from '../plot/point';
import type { PlotConfig } from '../plot/rulers';
import type { Shape } from '../plot/shapes';
import type { ScreenTransform } from '../plot/transform';
import { Candle, CandleElem, type CandleElemOptions } from './candle-elem';
import { type ChartElement, elementRulersAndText, elementShapes, withElementStyle } from './chart-element';
import { elementBounds } from './rect-element';

/**
 * Produces the hover label of one element. Receives the plot that owns the
 * element so it can use the plot's name or neighbouring elements.
 */
export type ElementFormatter = (elem: ChartElement, parent: ChartPlot) => string;

export interface ClosestElement {
	index: number;
	/** Squared screen distance from the query position to the element. */
	distSq: number;
}

export interface CandlePlacement {
	/** x of the first candle. */
	start: number;
	/** x distance between consecutive candles. */
	spacing: number;
}

const defaultCandlePlacement: CandlePlacement = {
	start: 0,
	spacing: 1,
};

interface ChartPlotState {
	name: string;
	elements: readonly ChartElement[];
	formatter: ElementFormatter | undefined;
	highlight: boolean;
}

/**
 * A named group of chart elements drawn as one plot item. Immutable like the
 * elements it holds.
 */
export class ChartPlot {
	private readonly _state: ChartPlotState;

	constructor(elements: readonly ChartElement[], state?: Partial<Omit<ChartPlotState, 'elements'>>) {
		this._state = {
			name: '',
			formatter: undefined,
			highlight: false,
			...state,
			elements,
		};
	}

	/**
	 * One candle element per candle, at `start`, `start + spacing`, ...
	 */
	static fromCandles(
		candles: readonly Candle[],
		placement?: Partial<CandlePlacement>,
		style?: Partial<Omit<CandleElemOptions, 'x'>>
	): ChartPlot {
		const { start, spacing } = { ...defaultCandlePlacement, ...placement };
		return new ChartPlot(
			candles.map((candle, i) => new CandleElem(candle, { ...style, x: start + i * spacing }))
		);
	}

	private _with(patch: Partial<ChartPlotState>): ChartPlot {
		const { elements, ...rest } = { ...this._state, ...patch };
		return new ChartPlot(elements, rest);
	}

	name(): string {
		return this._state.name;
	}

	elements(): readonly ChartElement[] {
		return this._state.elements;
	}

	elementFormatter(): ElementFormatter | undefined {
		return this._state.formatter;
	}

	isHighlighted(): boolean {
		return this._state.highlight;
	}

	withName(name: string): ChartPlot {
		return this._with({ name });
	}

	withElementFormatter(formatter: ElementFormatter): ChartPlot {
		return this._with({ formatter });
	}

	withHighlight(highlight = true): ChartPlot {
		return this._with({ highlight });
	}

	/**
	 * Strokes every element in `color` and fills it with a half transparent
	 * version of it. Stroke widths are kept.
	 */
	withColor(color: string): ChartPlot {
		const fill = setOpacity(color, 0.5);
		return this._with({
			elements: this._state.elements.map((elem) =>
				withElementStyle(elem, { ...elem.stroke, color }, fill)
			),
		});
	}

	bounds(): PlotBounds {
		return this._state.elements.reduce<PlotBounds>(
			(bounds, elem) => mergeBounds(bounds, elementBounds(elem)),
			emptyBounds()
		);
	}

	/**
	 * Emits every element's shapes. All elements are highlighted when the plot
	 * is; otherwise only the one at `highlightedIndex`, if given.
	 */
	shapes(transform: ScreenTransform, shapes: Shape[], highlightedIndex?: number): void {
		this._state.elements.forEach((elem, index) => {
			const highlighted = this._state.highlight || index === highlightedIndex;
			elementShapes(elem, transform, highlighted, shapes);
		});
	}

	findClosest(pos: Pos2, transform: ScreenTransform): ClosestElement | undefined {
		let closest: ClosestElement | undefined;
		this._state.elements.forEach((elem, index) => {
			const rect = transform.rectFromValues(elem.boundsMin(), elem.boundsMax());
			const distSq = rectDistanceSq(rect, pos);
			if (closest === undefined || distSq < closest.distSq) {
				closest = { index, distSq };
			}
		});
		return closest;
	}

	/**
	 * Rulers and label for the element at `index`, labelled by this plot's
	 * formatter when one is set.
	 */
	onHover(index: number, plot: PlotConfig, shapes: Shape[]): void {
		const { elements } = this._state;
		if (!Number.isInteger(index) || index < 0 || index >= elements.length) {
			console.warn(`Hover index ${index} is outside plot "${this._state.name}" (${elements.length} elements).`);
			return;
		}

		const elem = elements[index];
		const formatter = this._state.formatter;
		const format = formatter === undefined
			? undefined
			: (hovered: ChartElement) => formatter(hovered, this);
		elementRulersAndText(elem, plot, shapes, format);
	}
}
