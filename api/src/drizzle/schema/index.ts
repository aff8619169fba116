export * from './day-totals';
export * from './tracker-meta';
export * from './participants';
export * from './period-compliments';
