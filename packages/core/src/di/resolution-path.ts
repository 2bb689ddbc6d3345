import { CircularDependencyError } from "../errors/injection-error";

type Frame = {
  binding: object;
  key: string;
};

// Resolution is synchronous, so one stack covers the whole call chain.
const resolving: Frame[] = [];

/**
 * Runs `construct` with `binding` on the resolution path. A binding already
 * on the path is a cycle; the error names every key from its first entry.
 */
export function withinResolution<T>(binding: object, key: string, construct: () => T): T {
  const start = resolving.findIndex((frame) => frame.binding === binding);
  if (start >= 0) {
    const path = [...resolving.slice(start).map((frame) => frame.key), key];
    throw new CircularDependencyError(path);
  }

  resolving.push({ binding, key });
  try {
    return construct();
  } finally {
    resolving.pop();
  }
}
