import type { CandlestickData, Time } from 'lightweight-charts';

export interface CandleSeriesData extends CandlestickData<Time> {
    time: Time;       // The time of the candle, typically required by the chart
    open: number;     // Opening price
    high: number;     // Highest price
    low: number;      // Lowest price
    close: number;    // Closing price

    volume?: number;  // Traded quantity, shown in the hover label (0 when missing)
}

