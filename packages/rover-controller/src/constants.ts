/**
 * Shared constants for the hazard rover controller.
 *
 * Centralizes magic numbers, defaults, and configuration values used
 * across the codebase.
 */

// --- Hazard Monitoring ---
export const DEFAULT_HAZARD_THRESHOLD_M = 5.0;
export const NO_HAZARD_DISTANCE_M = 999.0;  // sentinel until the first reading

// --- Safe Mode ---
export const DEFAULT_SAFE_MODE_SPEED_CAP = 0.3;  // 30% of full speed

// --- Operator Input ---
export const DEFAULT_SAMPLE_INTERVAL_MS = 50;     // ~20 Hz
export const DEFAULT_COMMAND_DEADZONE = 0.01;
export const DEFAULT_STICK_DEADZONE = 0.2;
export const SPEED_STEP_PERCENT = 5;             // per tick at full speed-axis deflection

// --- ROS Topics ---
export const DEFAULT_HAZARD_DISTANCE_TOPIC = '/uwb/hazard_distance';
export const DEFAULT_CMD_VEL_TOPIC = '/cmd_vel';
export const DEFAULT_EMERGENCY_ALERT_TOPIC = '/emergency_alert';
export const FLOAT32_MSG_TYPE = 'std_msgs/msg/Float32';
export const STRING_MSG_TYPE = 'std_msgs/msg/String';
export const TWIST_MSG_TYPE = 'geometry_msgs/msg/Twist';

// --- Bridge Connection ---
export const DEFAULT_BRIDGE_URL = 'ws://localhost:9090';
export const BRIDGE_CONNECT_TIMEOUT_MS = 10000;
export const BRIDGE_RECONNECT_INTERVAL_MS = 5000;
export const BRIDGE_HEARTBEAT_INTERVAL_MS = 15000;
export const BRIDGE_HEARTBEAT_STALE_MS = 30000;

// --- Event History ---
export const DEFAULT_EVENT_HISTORY = 200;
export const DEFAULT_STATE_HISTORY = 100;

// --- Node ---
export const MIN_NODE_VERSION = 20;

// --- Package ---
export const PACKAGE_NAME = 'hazard-rover-controller';
export const VERSION = '0.1.0';
