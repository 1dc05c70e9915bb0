/**
 * Mesh Cache
 *
 * Memoizes tessellation per shape id. An entry is valid only for the
 * geometry version, fill color and winding rule it was built from; any
 * other combination recomputes it.
 */

import { tessellateShape, type TessellateOptions } from "./tessellate";
import type { Color, ShapeDescriptor, ShapeStyle, TriangleMesh } from "./types";

interface CacheEntry {
  version: number;
  style: ShapeStyle;
  mesh: TriangleMesh;
}

function sameColor(a: Readonly<Color>, b: Readonly<Color>): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2] && a[3] === b[3];
}

function sameStyle(a: ShapeStyle, b: ShapeStyle): boolean {
  return a.winding === b.winding && sameColor(a.color, b.color);
}

export interface MeshCacheStats {
  hits: number;
  misses: number;
  size: number;
}

export type Tessellator = (shape: ShapeDescriptor) => TriangleMesh;

export class MeshCache {
  private entries = new Map<string, CacheEntry>();
  private readonly tessellate: Tessellator;
  private hits = 0;
  private misses = 0;

  constructor(options: TessellateOptions = {}, tessellate?: Tessellator) {
    this.tessellate = tessellate ?? ((shape) => tessellateShape(shape, options));
  }

  /**
   * Get the mesh for a shape id at a geometry version and style,
   * tessellating `describe()` on a miss.
   */
  getOrCreate(
    id: string,
    version: number,
    style: ShapeStyle,
    describe: () => ShapeDescriptor
  ): TriangleMesh {
    const entry = this.entries.get(id);
    if (entry && entry.version === version && sameStyle(entry.style, style)) {
      this.hits++;
      return entry.mesh;
    }

    this.misses++;
    const mesh = this.tessellate(describe());
    this.entries.set(id, {
      version,
      style: { color: [...style.color], winding: style.winding },
      mesh,
    });
    return mesh;
  }

  /** Check if a mesh is cached for this id and version */
  has(id: string, version: number): boolean {
    return this.entries.get(id)?.version === version;
  }

  /** Drop the entry for a shape */
  invalidate(id: string): boolean {
    return this.entries.delete(id);
  }

  /** Drop every entry whose id is not in `ids` */
  retain(ids: ReadonlySet<string>): void {
    for (const id of this.entries.keys()) {
      if (!ids.has(id)) {
        this.entries.delete(id);
      }
    }
  }

  /** Clear all entries */
  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  get stats(): MeshCacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }
}
