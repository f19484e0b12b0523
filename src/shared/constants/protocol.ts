// Target keyboard (Hall-effect analog board)
export const DEFAULT_VENDOR_ID = 0x41e4
export const DEFAULT_PRODUCT_ID = 0x2103
export const HID_USAGE_COUNT = 256

// Bridge frame layout: [type][reserved][payload...]
export const FRAME_HEADER_LEN = 2
export const FRAME_MIN_LEN = 3
export const FRAME_TYPE_ANALOG = 0x03

// Analog report layout: [0xA0][pad][pad][key][raw_hi][raw_lo]
export const ANALOG_REPORT_ID = 0xa0
export const ANALOG_REPORT_MIN_LEN = 6
export const ANALOG_KEY_OFFSET = 3
export const ANALOG_RAW_OFFSET = 4
export const ANALOG_DEADZONE = 10
export const ANALOG_MAX = 1550.0
export const PRESSED_THRESHOLD = 0.01

// Timing
export const SEARCH_INTERVAL_MS = 2000
export const RETRY_DELAY_MS = 2000
export const RECONNECT_DELAY_MS = 500
export const STATUS_POLL_MS = 100

// Loopback relay
export const BRIDGE_HOST = '127.0.0.1'
export const WS_PORT_PLACEHOLDER = '__WS_PORT__'
export const VID_PLACEHOLDER = '__VID__'
export const PID_PLACEHOLDER = '__PID__'

// Status messages
export const STATUS_STARTING = 'Starting...'
export const STATUS_NOT_FOUND = 'Keyboard not found - plug it in'
export const STATUS_DETECTED = 'Keyboard detected - launching Chrome bridge...'
export const STATUS_WAITING = 'Waiting for Chrome connection...'
export const STATUS_CONNECTED = 'Chrome connected - click Connect in browser'
export const STATUS_ANALOG_ACTIVE = 'Analog active!'
export const STATUS_DISCONNECTED = 'Chrome disconnected - reconnecting...'
