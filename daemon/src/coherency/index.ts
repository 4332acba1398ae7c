/**
 * Coherency Engine: computes the dependency edits a build requires.
 *
 * Two layers:
 *   1. direct updates     dependencies named by a build asset whose version,
 *                         repository or commit differs from the target graph
 *   2. coherency updates  dependencies pinned to a coherent parent, moved to
 *                         whatever the parent's own manifest requires at the
 *                         parent's new commit
 *
 * Under `strict` policy an unresolvable coherency requirement is recorded as
 * an error but never blocks the direct updates. Under `legacy` it is skipped.
 */

import type {
  Asset,
  AssetUpdate,
  CoherencyErrorDetails,
  CoherencyMode,
  DependencyDetail,
} from "../models/types.js";

export interface DependencyGraphReader {
  getDependencies(repoUri: string, ref: string): Promise<DependencyDetail[]>;
}

export interface CoherencyInput {
  sourceRepository: string;
  commit: string;
  assets: readonly Asset[];
}

export interface CoherencyResult {
  requiredUpdates: AssetUpdate[];
  coherencySuccessful: boolean;
  errors: CoherencyErrorDetails[];
}

export interface RequiredUpdatesRequest {
  targetRepository: string;
  /** Branch or commit the target graph is read from. */
  ref: string;
  update: CoherencyInput;
  mode: CoherencyMode;
}

const normalize = (name: string) => name.toLowerCase();

function differs(a: DependencyDetail, b: DependencyDetail): boolean {
  return a.version !== b.version || a.repoUri !== b.repoUri || a.commit !== b.commit;
}

export async function getRequiredUpdates(
  reader: DependencyGraphReader,
  request: RequiredUpdatesRequest
): Promise<CoherencyResult> {
  const { update, mode } = request;
  if (update.assets.length === 0) {
    return { requiredUpdates: [], coherencySuccessful: true, errors: [] };
  }

  const graph = await reader.getDependencies(request.targetRepository, request.ref);
  const assets = new Map(update.assets.map((a) => [normalize(a.name), a]));
  const original = new Map(graph.map((d) => [normalize(d.name), d]));
  const current = new Map(original);
  const requiredUpdates: AssetUpdate[] = [];
  const errors: CoherencyErrorDetails[] = [];

  for (const dep of graph) {
    if (dep.coherentParentDependency || dep.pinned) continue;
    const asset = assets.get(normalize(dep.name));
    if (!asset) continue;

    const to: DependencyDetail = {
      ...dep,
      version: asset.version,
      repoUri: update.sourceRepository,
      commit: update.commit,
    };
    if (differs(dep, to)) {
      requiredUpdates.push({ from: dep, to, reason: "direct" });
      current.set(normalize(dep.name), to);
    }
  }

  const fail = (error: string) => {
    if (mode === "strict") {
      errors.push({ error, potentialSolutions: [] });
    } else {
      console.warn(`[coherency] ${error} (ignored under legacy policy)`);
    }
  };

  // Parents resolve before their children; whatever is left after no
  // progress is made sits on a parent cycle.
  const parentGraphs = new Map<string, Promise<DependencyDetail[]>>();
  const readParentGraph = (parent: DependencyDetail) => {
    const cacheKey = `${parent.repoUri}@${parent.commit}`;
    let graphRead = parentGraphs.get(cacheKey);
    if (!graphRead) {
      graphRead = reader.getDependencies(parent.repoUri, parent.commit);
      parentGraphs.set(cacheKey, graphRead);
    }
    return graphRead;
  };

  const unresolved = new Set(
    graph.filter((d) => d.coherentParentDependency && !d.pinned).map((d) => normalize(d.name))
  );
  let progressed = true;

  while (unresolved.size > 0 && progressed) {
    progressed = false;
    for (const childKey of [...unresolved]) {
      const child = original.get(childKey);
      const parentName = child?.coherentParentDependency;
      if (!child || !parentName) {
        unresolved.delete(childKey);
        continue;
      }

      const parentKey = normalize(parentName);
      if (unresolved.has(parentKey)) continue;

      unresolved.delete(childKey);
      progressed = true;

      const parent = current.get(parentKey);
      if (!parent) {
        fail(`Dependency ${child.name} has coherent parent ${parentName}, which is not a dependency`);
        continue;
      }
      if (parent === original.get(parentKey)) continue;

      const parentGraph = await readParentGraph(parent);
      const required = parentGraph.find((d) => normalize(d.name) === childKey);
      if (!required) {
        fail(`${parent.repoUri} @ ${parent.commit} does not contain dependency ${child.name}`);
        continue;
      }

      const to: DependencyDetail = {
        ...child,
        version: required.version,
        repoUri: required.repoUri,
        commit: required.commit,
      };
      if (differs(child, to)) {
        requiredUpdates.push({ from: child, to, reason: "coherency" });
        current.set(childKey, to);
      }
    }
  }

  for (const childKey of unresolved) {
    const child = original.get(childKey);
    fail(`Dependency ${child?.name ?? childKey} is part of a coherent parent cycle`);
  }

  return {
    requiredUpdates,
    coherencySuccessful: errors.length === 0,
    errors,
  };
}

/** Union by dependency name; later lists win. */
export function mergeRequiredUpdates(lists: readonly AssetUpdate[][]): AssetUpdate[] {
  const merged = new Map<string, AssetUpdate>();
  for (const list of lists) {
    for (const update of list) {
      const key = normalize(update.to.name);
      const existing = merged.get(key);
      merged.set(key, existing ? { ...update, from: existing.from } : update);
    }
  }
  return [...merged.values()];
}
