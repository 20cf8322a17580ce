import { DirectedGraph } from 'graphology';
import type { CanonicalEntity, DiseaseHierarchy } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Entry of the DOID cancer-leaf file, reduced to what the hierarchy needs.
 */
export interface LabelPathsEntry {
    label: string;
    label_paths_to_root?: readonly (readonly string[])[];
}

/**
 * Hierarchy from precomputed label paths (root first). Only the first path
 * of an entry is used; the entity's own label closes the path.
 */
export function hierarchyFromLabelPaths(entries: ReadonlyMap<string, LabelPathsEntry>): DiseaseHierarchy {
    const hierarchy = new Map<string, readonly string[]>();

    for (const [id, entry] of entries) {
        const path = [...(entry.label_paths_to_root?.[0] ?? [])];
        if (path[path.length - 1] !== entry.label) {
            path.push(entry.label);
        }
        hierarchy.set(id, path);
    }

    return hierarchy;
}

function parentIds(entity: CanonicalEntity): string[] {
    const parents = entity.attributes['parents'];
    if (typeof parents === 'string') return [parents];
    if (!Array.isArray(parents)) return [];
    return parents.filter((parent): parent is string => typeof parent === 'string');
}

/**
 * Hierarchy from `parents` attributes. The graph is built once; each path
 * climbs through the lexicographically smallest parent until it reaches a
 * root, a parent outside the dictionary, or a node already on the path.
 */
export function hierarchyFromParents(entities: readonly CanonicalEntity[]): DiseaseHierarchy {
    const graph = new DirectedGraph<{ label: string }>();

    for (const entity of entities) {
        graph.mergeNode(entity.primary_id, { label: entity.preferred_label });
    }
    for (const entity of entities) {
        for (const parent of parentIds(entity)) {
            if (graph.hasNode(parent) && parent !== entity.primary_id) {
                graph.mergeEdge(parent, entity.primary_id);
            }
        }
    }

    const hierarchy = new Map<string, readonly string[]>();
    let cycles = 0;

    graph.forEachNode((id) => {
        const path: string[] = [];
        const seen = new Set<string>();
        let current: string | undefined = id;

        while (current !== undefined && !seen.has(current)) {
            seen.add(current);
            path.unshift(graph.getNodeAttribute(current, 'label'));
            current = graph.inNeighbors(current).sort()[0];
        }
        if (current !== undefined) cycles++;

        hierarchy.set(id, path);
    });

    logger.debug({ nodes: graph.order, edges: graph.size, cycles }, 'Disease hierarchy built');

    return hierarchy;
}
