import { LineSegment } from '../models/line-segment.model';
import { WirePath } from '../models/wire-path.model';
import { Point } from '../models/wire.types';
import { GeometryService } from './geometry.service';

interface EndpointEntry {
  /** First point seen for this key */
  point: Point;
  /** Indices of segments with an endpoint here; a closed segment appears twice */
  segments: number[];
}

interface ConnectivityGraph {
  endpoints: Map<string, EndpointEntry>;
  /** Segment index -> indices of touching segments */
  adjacency: Map<number, Set<number>>;
}

/**
 * Groups wire segments into continuous routes.
 *
 * Segments are adjacent when they share an endpoint or when two of their
 * endpoints lie within the connection tolerance. Routes are the connected
 * components of that graph, never crossing between colors.
 */
export class WirePathTracer {
  private readonly geometry = new GeometryService();

  constructor(private readonly tolerance: number = 5.0) {}

  tracePaths(segments: readonly LineSegment[]): WirePath[] {
    if (segments.length === 0) {
      return [];
    }

    const { adjacency } = this.buildGraph(segments);
    const visited = new Set<number>();
    const paths: WirePath[] = [];

    for (let i = 0; i < segments.length; i++) {
      if (visited.has(i)) continue;

      const members = this.collectComponent(i, segments, adjacency, visited);
      const seed = segments[i];
      paths.push(new WirePath(members.map(index => segments[index]), seed.color, seed.pageIndex));
    }

    return paths;
  }

  /**
   * Points where three or more segment endpoints coincide. Tolerance bridges
   * do not count towards the total.
   */
  findJunctions(segments: readonly LineSegment[]): Point[] {
    const { endpoints } = this.buildGraph(segments);
    const junctions: Point[] = [];

    for (const entry of endpoints.values()) {
      if (entry.segments.length >= 3) {
        junctions.push({ x: entry.point.x, y: entry.point.y });
      }
    }

    return junctions;
  }

  private buildGraph(segments: readonly LineSegment[]): ConnectivityGraph {
    const endpoints = new Map<string, EndpointEntry>();
    const adjacency = new Map<number, Set<number>>();

    const addEndpoint = (point: Point, index: number) => {
      const key = this.geometry.pointKey(point);
      const entry = endpoints.get(key);
      if (entry) {
        entry.segments.push(index);
      } else {
        endpoints.set(key, { point, segments: [index] });
      }
    };

    segments.forEach((segment, index) => {
      adjacency.set(index, new Set());
      addEndpoint(segment.start, index);
      addEndpoint(segment.end, index);
    });

    const link = (a: number, b: number) => {
      if (a === b) return;
      adjacency.get(a)?.add(b);
      adjacency.get(b)?.add(a);
    };

    // Shared endpoints
    for (const entry of endpoints.values()) {
      for (let i = 0; i < entry.segments.length; i++) {
        for (let j = i + 1; j < entry.segments.length; j++) {
          link(entry.segments[i], entry.segments[j]);
        }
      }
    }

    // Small rendering gaps between distinct endpoints
    for (const [first, second] of this.nearbyEndpointPairs([...endpoints.values()])) {
      for (const a of first.segments) {
        for (const b of second.segments) {
          link(a, b);
        }
      }
    }

    return { endpoints, adjacency };
  }

  /**
   * Pairs of distinct endpoints no further apart than the tolerance.
   * Endpoints are bucketed into tolerance-sized cells so only neighbouring
   * cells are compared.
   */
  private nearbyEndpointPairs(entries: EndpointEntry[]): Array<[EndpointEntry, EndpointEntry]> {
    const pairs: Array<[EndpointEntry, EndpointEntry]> = [];
    if (this.tolerance <= 0) {
      return pairs;
    }

    const cellSize = this.tolerance;
    const cells = new Map<string, number[]>();
    const cellOf = (p: Point): [number, number] => [Math.floor(p.x / cellSize), Math.floor(p.y / cellSize)];

    entries.forEach((entry, index) => {
      const [cx, cy] = cellOf(entry.point);
      const key = `${cx},${cy}`;
      const bucket = cells.get(key);
      if (bucket) {
        bucket.push(index);
      } else {
        cells.set(key, [index]);
      }
    });

    entries.forEach((entry, index) => {
      const [cx, cy] = cellOf(entry.point);
      for (let dx = -1; dx <= 1; dx++) {
        for (let dy = -1; dy <= 1; dy++) {
          for (const otherIndex of cells.get(`${cx + dx},${cy + dy}`) ?? []) {
            if (otherIndex <= index) continue;

            const other = entries[otherIndex];
            const distance = this.geometry.distance(entry.point, other.point);
            if (distance > 0 && distance <= this.tolerance) {
              pairs.push([entry, other]);
            }
          }
        }
      }
    });

    return pairs;
  }

  /**
   * Breadth-first walk from one segment. Only crosses to neighbours of the
   * same color; each segment is visited once.
   */
  private collectComponent(
    start: number,
    segments: readonly LineSegment[],
    adjacency: Map<number, Set<number>>,
    visited: Set<number>
  ): number[] {
    const members: number[] = [];
    const queue = [start];
    visited.add(start);

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      members.push(current);

      for (const neighbour of adjacency.get(current) ?? []) {
        if (visited.has(neighbour)) continue;
        if (segments[neighbour].color !== segments[current].color) continue;

        visited.add(neighbour);
        queue.push(neighbour);
      }
    }

    return members;
  }
}
