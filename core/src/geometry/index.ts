export { Coordinates } from './Coordinates';
export { Compass } from './Compass';
