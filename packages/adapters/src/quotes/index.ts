export { DEFAULT_QUOTE_WINDOW, type DailyCloses, type QuoteProvider, type QuoteWindow } from './types.js';
export { YahooChartQuoteProvider, type YahooChartOptions } from './yahoo-chart.js';
export { StaticQuoteProvider } from './static.js';
