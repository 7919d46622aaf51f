export { constructCard, componentChips } from './cards.js';
export type { ConstructCard } from './cards.js';
export { radarSeries, RADAR_RANGE } from './radar.js';
export type { RadarSeries } from './radar.js';
export { defaultSelection, partitionKeys } from './selection.js';
