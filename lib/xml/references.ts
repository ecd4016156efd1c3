/**
 * Cross-reference resolver
 *
 * Turns each chunk's declared references into index links once the final
 * chunk order is known. A target that matches another chunk's identifier
 * becomes a forward link on the source and a back link on the target; a
 * target outside the document is kept as an external reference.
 */

import { xmlDebug } from "./debug";
import type { Chunk, Diagnostic } from "./types";

const dbg = xmlDebug("refs");

function addUnique<T>(map: Record<string, T[]>, key: string, value: T): void {
  const values = map[key];
  if (!values) {
    map[key] = [value];
  } else if (!values.includes(value)) {
    values.push(value);
  }
}

function sortLinks(links: Record<string, number[]>): Record<string, number[]> {
  const sorted: Record<string, number[]> = {};
  for (const key of Object.keys(links).sort()) {
    sorted[key] = [...(links[key] ?? [])].sort((a, b) => a - b);
  }
  return sorted;
}

/**
 * Resolve declared references into links. Returns new chunk objects; the
 * input is left untouched.
 */
export function resolveReferences(chunks: readonly Chunk[]): {
  chunks: Chunk[];
  diagnostics: Diagnostic[];
} {
  const diagnostics: Diagnostic[] = [];
  // identifier -> position of the first chunk carrying it
  const byIdentifier = new Map<string, number>();

  chunks.forEach((chunk, position) => {
    if (!chunk.identifier) {
      return;
    }
    const first = byIdentifier.get(chunk.identifier);
    if (first === undefined) {
      byIdentifier.set(chunk.identifier, position);
    } else {
      diagnostics.push({
        kind: "duplicate_identifier",
        identifier: chunk.identifier,
        chunkIndex: chunk.index,
        firstIndex: chunks[first]?.index ?? first,
      });
    }
  });

  const references = chunks.map((): Record<string, number[]> => ({}));
  const referencedBy = chunks.map((): Record<string, number[]> => ({}));
  const external = chunks.map((): Record<string, string[]> => ({}));

  let resolved = 0;
  chunks.forEach((chunk, position) => {
    const forward = references[position] ?? {};
    const unresolved = external[position] ?? {};
    for (const { key, target } of chunk.declaredReferences) {
      const targetPosition = byIdentifier.get(target);
      const targetChunk =
        targetPosition === undefined ? undefined : chunks[targetPosition];
      if (targetPosition === undefined || !targetChunk) {
        if (!unresolved[key]?.includes(target)) {
          addUnique(unresolved, key, target);
          diagnostics.push({
            kind: "unresolved_reference",
            chunkIndex: chunk.index,
            key,
            target,
          });
        }
        continue;
      }
      addUnique(forward, key, targetChunk.index);
      addUnique(referencedBy[targetPosition] ?? {}, key, chunk.index);
      resolved++;
    }
  });

  dbg(
    "resolved %d references across %d chunks, %d diagnostics",
    resolved,
    chunks.length,
    diagnostics.length
  );

  return {
    chunks: chunks.map((chunk, i) => ({
      ...chunk,
      declaredReferences: [...chunk.declaredReferences],
      references: sortLinks(references[i] ?? {}),
      referencedBy: sortLinks(referencedBy[i] ?? {}),
      externalReferences: { ...(external[i] ?? {}) },
    })),
    diagnostics,
  };
}
