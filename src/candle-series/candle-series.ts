import { customSeriesDefaultOptions, type CustomSeriesOptions, type CustomSeriesPricePlotValues, type ICustomSeriesPaneView, type PaneRendererCustomData, type Time, type WhitespaceData } from 'lightweight-charts';
import type { CandleSeriesData } from './data';
import { CandleSeriesRenderer } from './renderer';

export interface CandleSeriesOptions extends CustomSeriesOptions {
	/** Body width as a fraction of the bar spacing. */
	candleWidth: number;
	/** Bounds padding around the whisker as a fraction of the bar spacing. */
	whiskerWidth: number;
	lineWidth: number;
	upColor: string;
	downColor: string;
	borderUpColor: string;
	borderDownColor: string;
	/** Draw crosshair rulers and the OHLCV label for the hovered bar. */
	showRulers: boolean;
	textColor: string;
	/** Label font size in media pixels. */
	fontSize: number;
	fontFamily: string;
}

export const candleSeriesDefaultOptions: CandleSeriesOptions = {
	...customSeriesDefaultOptions,
	candleWidth: 0.6,
	whiskerWidth: 0.15,
	lineWidth: 1,
	upColor: 'rgba(0,128,0,0.333)',
	downColor: 'rgba(140,0,0,0.333)',
	borderUpColor: '#008000',
	borderDownColor: '#8C0000',
	showRulers: true,
	textColor: '#d1d4dc',
	fontSize: 12,
	fontFamily: 'sans-serif',
} as const;

export class CandleSeries<TData extends CandleSeriesData>
	implements ICustomSeriesPaneView<Time, TData, CandleSeriesOptions>
{
	_renderer: CandleSeriesRenderer<TData>;

	constructor() {
		this._renderer = new CandleSeriesRenderer();
	}

	priceValueBuilder(plotRow: TData): CustomSeriesPricePlotValues {
		return [plotRow.high, plotRow.low, plotRow.close];
	}

	renderer(): CandleSeriesRenderer<TData> {
		return this._renderer;
	}

	isWhitespace(data: TData | WhitespaceData): data is WhitespaceData {
		return !('close' in data);
	}

	update(
		data: PaneRendererCustomData<Time, TData>,
		options: CandleSeriesOptions
	): void {
		this._renderer.update(data, options);
	}

	defaultOptions(): CandleSeriesOptions {
		return candleSeriesDefaultOptions;
	}

	/**
	 * Logical index of the bar under the crosshair, or null when none is.
	 * Takes effect on the next redraw.
	 */
	setHoveredIndex(index: number | null): void {
		this._renderer.setHoveredIndex(index);
	}
}
