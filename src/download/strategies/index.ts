export { VideoStrategy } from './VideoStrategy';
export { ImageStrategy } from './ImageStrategy';
export { selectStrategyOrder } from './selectStrategyOrder';
export { runExtraction, OUTPUT_TEMPLATE } from './runExtraction';
export type { StrategyDependencies } from './runExtraction';
