export * from './batcher';
export * from './csvFormats';
export * from './csvWriter';
export * from './errors';
export * from './manual';
export * from './mappings';
export * from './pipeline';
export * from './points';
export * from './sourceCopy';
export * from './spreadsheet';
export * from './store';
export * from './tabular';
export * from './time';
export * from './transform';
export * from './types';
export * from './waveform';
