// A sensor reports whether the rover may occupy a cell.
// Sensors are shared between rovers and must not depend on rover state.
export interface ISensor {
  isSafe(x: number, y: number): boolean;
}
