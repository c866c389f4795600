import type { ExternalConfig } from '../../types/index.js';

export interface ExternalConfigInit {
  projectName?: string;
  sourceRoots?: Iterable<string>;
  compileDepJars?: Iterable<string>;
  runtimeDepJars?: Iterable<string>;
  testDepJars?: Iterable<string>;
  target?: string;
}

function frozenSet(paths: Iterable<string> = []): readonly string[] {
  return Object.freeze(Array.from(new Set(paths)).sort());
}

/**
 * Build an immutable ExternalConfig. Absent collections become empty ones;
 * absent optional fields are left off entirely so two configs with the same
 * values compare deep-equal.
 */
export function createExternalConfig(init: ExternalConfigInit): ExternalConfig {
  const config: ExternalConfig = {
    ...(init.projectName !== undefined ? { projectName: init.projectName } : {}),
    sourceRoots: frozenSet(init.sourceRoots),
    compileDepJars: frozenSet(init.compileDepJars),
    runtimeDepJars: frozenSet(init.runtimeDepJars),
    testDepJars: frozenSet(init.testDepJars),
    ...(init.target !== undefined ? { target: init.target } : {})
  };
  return Object.freeze(config);
}
