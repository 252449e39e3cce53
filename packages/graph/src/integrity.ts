import type { Ord } from "@graphfold/std";
import type { EdgeRecord } from "./edge-list.js";
import type { GraphKind, IntegrityReport, IntegrityViolation } from "./types.js";
import type { VertexStore } from "./vertex-store.js";

/**
 * Check every structural invariant of the adjacency lists without throwing.
 *
 * Per list: no self-loops, positive integer weights, heads strictly
 * ascending, every head a known vertex. Undirected graphs additionally need
 * each edge mirrored with the same weight; a mismatch is reported once per
 * pair, from the endpoint with the smaller key.
 */
export function inspectStore<T>(
  store: VertexStore<T>,
  kind: GraphKind,
  ord: Ord<T>
): IntegrityReport<T> {
  const violations: IntegrityViolation<T>[] = [];

  for (const vertex of store) {
    let previous: EdgeRecord<T> | undefined;
    for (const edge of vertex.edges) {
      if (ord.equals(edge.head, vertex.key)) {
        violations.push({ kind: "self-loop", vertex: vertex.key });
      }
      if (!Number.isInteger(edge.weight) || edge.weight <= 0) {
        violations.push({ kind: "invalid-weight", vertex: vertex.key, head: edge.head, weight: edge.weight });
      }
      if (previous) {
        const c = ord.compare(previous.head, edge.head);
        if (c === 0) {
          violations.push({ kind: "duplicate-head", vertex: vertex.key, head: edge.head });
        } else if (c > 0) {
          violations.push({ kind: "unsorted", vertex: vertex.key, previous: previous.head, head: edge.head });
        }
      }
      previous = edge;

      const target = store.find(edge.head);
      if (!target) {
        violations.push({ kind: "dangling-head", vertex: vertex.key, head: edge.head });
        continue;
      }
      if (kind === "undirected") {
        const mirror = target.edges.find(vertex.key);
        if (!mirror) {
          violations.push({ kind: "asymmetric", tail: vertex.key, head: edge.head });
        } else if (mirror.weight !== edge.weight && ord.lessThan(vertex.key, edge.head)) {
          violations.push({
            kind: "weight-mismatch",
            tail: vertex.key,
            head: edge.head,
            weight: edge.weight,
            mirrorWeight: mirror.weight,
          });
        }
      }
    }
  }

  return { valid: violations.length === 0, violations };
}
