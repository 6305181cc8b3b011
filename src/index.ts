export * from './plot/point';
export * from './plot/transform';
export * from './plot/shapes';
export * from './plot/painter';
export * from './plot/rulers';
export * from './helpers/colors';
export * from './helpers/formatting';
export * from './items/rect-element';
export * from './items/candle-elem';
export * from './items/bar-elem';
export * from './items/chart-element';
export * from './items/chart-plot';
export * from './candle-series/data';
export * from './candle-series/series-transform';
export * from './candle-series/renderer';
export * from './candle-series/candle-series';
