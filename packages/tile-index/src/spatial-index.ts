import RBush from "rbush";
import type { BoundingBox } from "./bbox.js";
import { union } from "./bbox.js";

/** A box stored in the index together with its payload. */
export type IndexEntry<T> = Readonly<{
  bbox: BoundingBox;
  payload: T;
}>;

/** R-tree item: x/y in rbush's own keys, time checked per candidate. */
type Node<T> = {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  mint: number;
  maxt: number;
  /** Insertion sequence number. */
  seq: number;
  entry: IndexEntry<T>;
};

/**
 * Range index over (x, y, time) boxes.
 *
 * The spatial axes are held in an R-tree; every R-tree candidate is then
 * checked against the time interval. Matches are returned in insertion order,
 * so the first hit for a query is stable across runs.
 *
 * Nothing is ever removed, and the same box may be inserted any number of
 * times.
 */
export class SpatialTemporalIndex<T> {
  private readonly tree = new RBush<Node<T>>();
  private nextSeq = 0;
  private _bounds: BoundingBox | null = null;

  /** Add a single box. */
  insert(bbox: BoundingBox, payload: T): void {
    this.tree.insert(this.toNode({ bbox, payload }));
  }

  /** Add many boxes at once. Faster than repeated `insert` for large batches. */
  load(entries: Iterable<IndexEntry<T>>): void {
    const nodes = Array.from(entries, (entry) => this.toNode(entry));
    if (nodes.length > 0) {
      this.tree.load(nodes);
    }
  }

  /**
   * Every stored entry whose box intersects `query`.
   *
   * The returned iterable is lazy; each iteration searches the index again.
   * It is empty, never an error, when nothing overlaps.
   */
  intersect(query: BoundingBox): Iterable<IndexEntry<T>> {
    return {
      [Symbol.iterator]: () => this.search(query),
    };
  }

  /** Union of all stored boxes, or null while the index is empty. */
  get bounds(): BoundingBox | null {
    return this._bounds;
  }

  /** Number of stored entries. */
  get size(): number {
    return this.nextSeq;
  }

  private *search(query: BoundingBox): Generator<IndexEntry<T>> {
    const candidates = this.tree.search({
      minX: query.minx,
      minY: query.miny,
      maxX: query.maxx,
      maxY: query.maxy,
    });
    candidates.sort((a, b) => a.seq - b.seq);

    for (const node of candidates) {
      if (node.mint <= query.maxt && query.mint <= node.maxt) {
        yield node.entry;
      }
    }
  }

  private toNode(entry: IndexEntry<T>): Node<T> {
    const { bbox } = entry;
    this._bounds = this._bounds === null ? bbox : union(this._bounds, bbox);

    return {
      minX: bbox.minx,
      minY: bbox.miny,
      maxX: bbox.maxx,
      maxY: bbox.maxy,
      mint: bbox.mint,
      maxt: bbox.maxt,
      seq: this.nextSeq++,
      entry,
    };
  }
}
