export { validateRoverConfig, loadRoverConfig } from './RoverConfig';
export type { ConfigValidationResult } from './RoverConfig';
