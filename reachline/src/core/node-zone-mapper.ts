/**
 * Lookup from network node ids to the zone that contains them.
 */
import { ValidationError } from './errors.js';

export interface NodeZoneRow {
  nodeId: number | null;
  zoneId: number | null;
}

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

export function isInt32(value: unknown): value is number {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= INT32_MIN &&
    value <= INT32_MAX
  );
}

export class NodeZoneMapper {
  private readonly zoneByNode: ReadonlyMap<number, number>;

  private constructor(zoneByNode: Map<number, number>) {
    this.zoneByNode = zoneByNode;
  }

  /**
   * Build a mapper from (node, zone) rows. Rows with a missing or
   * non-int32 id are skipped; a node listed twice keeps its first zone.
   */
  static fromRows(rows: Iterable<NodeZoneRow>): NodeZoneMapper {
    const zoneByNode = new Map<number, number>();
    let skippedRows = 0;
    let conflictingRows = 0;

    for (const row of rows) {
      if (!isInt32(row.nodeId) || !isInt32(row.zoneId)) {
        skippedRows++;
        continue;
      }
      const existing = zoneByNode.get(row.nodeId);
      if (existing !== undefined) {
        if (existing !== row.zoneId) conflictingRows++;
        continue;
      }
      zoneByNode.set(row.nodeId, row.zoneId);
    }

    if (zoneByNode.size === 0) {
      throw new ValidationError('Node-to-zone mapping is empty');
    }

    if (skippedRows > 0 || conflictingRows > 0) {
      console.warn(
        `Node mapping: skipped ${skippedRows} rows with missing ids, ${conflictingRows} nodes mapped to more than one zone`
      );
    }

    return new NodeZoneMapper(zoneByNode);
  }

  zoneOf(nodeId: number): number | undefined {
    return this.zoneByNode.get(nodeId);
  }

  /** Mapped nodes */
  get size(): number {
    return this.zoneByNode.size;
  }

  get zoneCount(): number {
    return new Set(this.zoneByNode.values()).size;
  }
}
