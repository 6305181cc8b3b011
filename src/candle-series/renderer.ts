// -------------------------------------
// Imports
// -------------------------------------

import type { BitmapCoordinatesRenderingScope, CanvasRenderingTarget2D } from 'fancy-canvas';

import type {
	ICustomSeriesPaneRenderer,
	PaneRendererCustomData,
	PriceToCoordinateConverter,
	Time,
} from 'lightweight-charts';

import { Candle, CandleElem } from '../items/candle-elem';
import { ChartPlot } from '../items/chart-plot';
import { paintShapes } from '../plot/painter';
import { type PlotConfig, defaultPlotConfig } from '../plot/rulers';
import type { Shape } from '../plot/shapes';
import type { CandleSeriesOptions } from './candle-series';
import type { CandleSeriesData } from './data';
import { type PriceToCoordinate, SeriesScreenTransform } from './series-transform';

/**
 * Scaling information of the bitmap the shapes are collected for.
 */
export type RenderScope = Pick<
	BitmapCoordinatesRenderingScope,
	'bitmapSize' | 'horizontalPixelRatio' | 'verticalPixelRatio'
>;

// -------------------------------------
// CandleSeriesRenderer Class
// -------------------------------------

/**
 * Pane renderer of the candle series. Every frame turns the visible bars into
 * candle elements, lets them emit their shapes through a transform of the
 * pane and paints the result.
 * @template TData - The type of candle series data.
 */
export class CandleSeriesRenderer<TData extends CandleSeriesData>
	implements ICustomSeriesPaneRenderer
{
	/**
	 * The current data to be rendered.
	 */
	private _data: PaneRendererCustomData<Time, TData> | null = null;

	/**
	 * The current rendering options.
	 */
	private _options: CandleSeriesOptions | null = null;

	/**
	 * Logical index of the hovered bar.
	 */
	private _hoveredIndex: number | null = null;

	/**
	 * Draws the candle series onto the provided canvas target.
	 * @param target - The canvas rendering target.
	 * @param priceConverter - Function to convert price values to canvas coordinates.
	 */
	draw(
		target: CanvasRenderingTarget2D,
		priceConverter: PriceToCoordinateConverter
	): void {
		target.useBitmapCoordinateSpace((scope) =>
			paintShapes(scope.context, this.collectShapes(priceConverter, scope))
		);
	}

	/**
	 * Updates the renderer with new data and options.
	 */
	update(
		data: PaneRendererCustomData<Time, TData>,
		options: CandleSeriesOptions
	): void {
		this._data = data;
		this._options = options;
	}

	setHoveredIndex(index: number | null): void {
		this._hoveredIndex = index;
	}

	/**
	 * Shapes of the visible bars in bitmap coordinates: a body and a whisker per
	 * candle, then rulers and label of the hovered candle.
	 */
	collectShapes(priceToCoordinate: PriceToCoordinate, scope: RenderScope): Shape[] {
		// Exit early if there's no data or options to render.
		if (
			!this._data ||
			this._data.bars.length === 0 ||
			!this._data.visibleRange ||
			!this._options
		) {
			return [];
		}

		const options = this._options;
		const { bars, barSpacing } = this._data;
		const from = Math.max(0, this._data.visibleRange.from);
		const to = Math.min(bars.length, this._data.visibleRange.to);
		if (from >= to) {
			return [];
		}

		const elements: CandleElem[] = [];
		for (let index = from; index < to; index++) {
			const { open, high, low, close, volume } = bars[index].originalData;
			const isUp = close >= open;
			elements.push(
				new CandleElem(new Candle(open, high, low, close, volume ?? 0), {
					x: index,
					candleWidth: options.candleWidth,
					whiskerWidth: options.whiskerWidth,
					stroke: {
						width: options.lineWidth,
						color: isUp ? options.borderUpColor : options.borderDownColor,
					},
					fill: isUp ? options.upColor : options.downColor,
				})
			);
		}

		const plot = new ChartPlot(elements);
		const { min } = plot.bounds();
		const transform = new SeriesScreenTransform({
			firstIndex: from,
			firstX: bars[from].x,
			barSpacing,
			priceToCoordinate,
			referencePrices: [min.y, min.y + 1],
			horizontalPixelRatio: scope.horizontalPixelRatio,
			verticalPixelRatio: scope.verticalPixelRatio,
			bitmapSize: scope.bitmapSize,
		});

		const hovered =
			this._hoveredIndex !== null && this._hoveredIndex >= from && this._hoveredIndex < to
				? this._hoveredIndex - from
				: undefined;

		const shapes: Shape[] = [];
		plot.shapes(transform, shapes, hovered);

		if (hovered !== undefined && options.showRulers) {
			const config: PlotConfig = {
				...defaultPlotConfig,
				transform,
				textColor: options.textColor,
				font: `${options.fontSize * scope.verticalPixelRatio}px ${options.fontFamily}`,
			};
			plot.onHover(hovered, config, shapes);
		}

		return shapes;
	}
}
