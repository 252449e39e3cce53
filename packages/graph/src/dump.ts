import type { VertexStore } from "./vertex-store.js";

/**
 * Render every vertex and its adjacency for debugging, one line per vertex in
 * slot order:
 *
 * ```
 * 1 [unvisited] -> 2 (1, 1) -> 3 (2, 0.5)
 * ```
 *
 * The format is for people, not parsers.
 */
export function renderDump<T>(store: VertexStore<T>, show: (key: T) => string): string {
  const lines: string[] = [];
  for (const vertex of store) {
    let line = `${show(vertex.key)} [${vertex.visited ? "visited" : "unvisited"}]`;
    for (const edge of vertex.edges) {
      line += ` -> ${show(edge.head)} (${edge.weight}, ${edge.distance})`;
    }
    lines.push(line);
  }
  return lines.join("\n");
}
