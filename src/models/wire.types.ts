/**
 * Wire detection types
 */

export interface Point {
  x: number;
  y: number;
}

/** Color sample, each channel in [0, 1] */
export type Rgb = readonly [number, number, number];

export const WireColor = {
  RED: 'red', // 24V / L+
  BLUE: 'blue', // 0V / L-
  GREEN: 'green', // PE
  YELLOW_GREEN: 'yellow_green', // PE
  BLACK: 'black', // phase
  BROWN: 'brown', // L1 / 24V+
  WHITE: 'white', // neutral / signal
  ORANGE: 'orange', // control
  GRAY: 'gray', // control
  OTHER: 'other',
} as const;

export type WireColor = (typeof WireColor)[keyof typeof WireColor];

export const ALL_WIRE_COLORS: readonly WireColor[] = Object.values(WireColor);

export const LineType = {
  WIRE: 'wire',
  BORDER: 'border',
  TITLE_BLOCK: 'title_block',
  TABLE_GRID: 'table_grid',
  COMPONENT_OUTLINE: 'component_outline',
  UNKNOWN: 'unknown',
} as const;

export type LineType = (typeof LineType)[keyof typeof LineType];

export const ALL_LINE_TYPES: readonly LineType[] = Object.values(LineType);

/**
 * Nominal voltage per wire color (industrial conventions).
 * Colors missing here map to UNKNOWN_VOLTAGE.
 */
export const VOLTAGE_BY_COLOR: Readonly<Partial<Record<WireColor, string>>> = {
  [WireColor.RED]: '24VDC',
  [WireColor.BROWN]: '24VDC',
  [WireColor.ORANGE]: '24VDC',
  [WireColor.BLUE]: '0V',
  [WireColor.GREEN]: 'PE',
  [WireColor.YELLOW_GREEN]: 'PE',
  [WireColor.BLACK]: '400VAC',
};

export const UNKNOWN_VOLTAGE = 'UNKNOWN';

export function voltageForColor(color: WireColor): string {
  return VOLTAGE_BY_COLOR[color] ?? UNKNOWN_VOLTAGE;
}

export interface PageSize {
  width: number;
  height: number;
}

export type ExitDirection = 'auto' | 'horizontal' | 'vertical';

export type RoutingStyle = 'manhattan' | 'l_path' | 'straight' | 'smooth';

/**
 * Logical connection from a connection table
 */
export interface DeviceConnection {
  sourceDevice: string;
  targetDevice: string;
  voltageLevel?: string;
  wireColor?: string;
}

export interface DevicePosition {
  x: number;
  y: number;
  width?: number;
  height?: number;
}

export interface RoutedWire {
  fromComponentId: string;
  toComponentId: string;
  voltageLevel: string;
  wireColor: string;
  path: Point[];
}
