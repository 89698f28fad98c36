export { BoundarySensor } from './BoundarySensor';
export { ObstacleSensor } from './ObstacleSensor';
export { SensorFactory } from './SensorFactory';
