/**
 * ROS 2 message shapes exchanged with the bridge.
 */

export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

export interface Twist {
  linear: Vector3;
  angular: Vector3;
}
