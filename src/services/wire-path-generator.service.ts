import {
  DeviceConnection,
  DevicePosition,
  ExitDirection,
  Point,
  RoutedWire,
  RoutingStyle,
  UNKNOWN_VOLTAGE
} from '../models/wire.types';

/**
 * Synthesizes routes between two points when no traced geometry exists,
 * e.g. for connections known only from a connection table.
 */
export class WirePathGenerator {
  /**
   * Orthogonal route with two bends through the midpoint of the dominant axis
   */
  generateManhattanPath(
    srcX: number,
    srcY: number,
    tgtX: number,
    tgtY: number,
    exitDirection: ExitDirection = 'auto'
  ): Point[] {
    const dx = tgtX - srcX;
    const dy = tgtY - srcY;

    const direction = exitDirection === 'auto'
      ? (Math.abs(dx) > Math.abs(dy) ? 'horizontal' : 'vertical')
      : exitDirection;

    if (direction === 'horizontal') {
      const midX = srcX + dx / 2;
      return [
        { x: srcX, y: srcY },
        { x: midX, y: srcY },
        { x: midX, y: tgtY },
        { x: tgtX, y: tgtY }
      ];
    }

    const midY = srcY + dy / 2;
    return [
      { x: srcX, y: srcY },
      { x: srcX, y: midY },
      { x: tgtX, y: midY },
      { x: tgtX, y: tgtY }
    ];
  }

  /**
   * Single right-angle bend
   */
  generateLPath(srcX: number, srcY: number, tgtX: number, tgtY: number, horizontalFirst: boolean = true): Point[] {
    const corner = horizontalFirst ? { x: tgtX, y: srcY } : { x: srcX, y: tgtY };
    return [{ x: srcX, y: srcY }, corner, { x: tgtX, y: tgtY }];
  }

  generateStraightLine(srcX: number, srcY: number, tgtX: number, tgtY: number): Point[] {
    return [
      { x: srcX, y: srcY },
      { x: tgtX, y: tgtY }
    ];
  }

  /**
   * Quadratic Bézier sampled at `segments + 1` points. The control point sits
   * at the midpoint, pushed sideways by a tenth of the distance.
   */
  generateSmoothPath(srcX: number, srcY: number, tgtX: number, tgtY: number, segments: number = 10): Point[] {
    const dx = tgtX - srcX;
    const dy = tgtY - srcY;
    const length = Math.hypot(dx, dy);

    if (length < 1) {
      return this.generateStraightLine(srcX, srcY, tgtX, tgtY);
    }

    const steps = Math.max(1, Math.floor(segments));
    const offset = length * 0.1;
    const ctrlX = (srcX + tgtX) / 2 - (dy / length) * offset;
    const ctrlY = (srcY + tgtY) / 2 + (dx / length) * offset;

    const points: Point[] = [];
    for (let i = 0; i <= steps; i++) {
      const t = i / steps;
      const u = 1 - t;
      points.push({
        x: u * u * srcX + 2 * u * t * ctrlX + t * t * tgtX,
        y: u * u * srcY + 2 * u * t * ctrlY + t * t * tgtY
      });
    }

    // Pin the ends exactly
    points[0] = { x: srcX, y: srcY };
    points[steps] = { x: tgtX, y: tgtY };

    return points;
  }

  generatePath(style: RoutingStyle, from: Point, to: Point): Point[] {
    switch (style) {
      case 'manhattan':
        return this.generateManhattanPath(from.x, from.y, to.x, to.y);
      case 'l_path':
        return this.generateLPath(from.x, from.y, to.x, to.y);
      case 'straight':
        return this.generateStraightLine(from.x, from.y, to.x, to.y);
      case 'smooth':
        return this.generateSmoothPath(from.x, from.y, to.x, to.y);
      default: {
        const unreachable: never = style;
        throw new Error(`Unknown routing style: ${String(unreachable)}`);
      }
    }
  }

  /**
   * Route every connection between the centres of its two devices.
   * Connections naming a device without a position are skipped.
   */
  routeConnections(
    connections: readonly DeviceConnection[],
    positions: Readonly<Record<string, DevicePosition>>,
    style: RoutingStyle = 'manhattan'
  ): RoutedWire[] {
    const wires: RoutedWire[] = [];

    for (const connection of connections) {
      const source = positions[connection.sourceDevice];
      const target = positions[connection.targetDevice];
      if (!source || !target) continue;

      wires.push({
        fromComponentId: connection.sourceDevice,
        toComponentId: connection.targetDevice,
        voltageLevel: connection.voltageLevel ?? UNKNOWN_VOLTAGE,
        wireColor: connection.wireColor ?? '',
        path: this.generatePath(style, this.centreOf(source), this.centreOf(target))
      });
    }

    return wires;
  }

  private centreOf(position: DevicePosition): Point {
    return {
      x: position.x + (position.width ?? 0) / 2,
      y: position.y + (position.height ?? 0) / 2
    };
  }
}
