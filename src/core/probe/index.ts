export {
  existingOf,
  firstExisting,
  expandJars,
  canonicalizeExisting,
  conventionalSourceRoots,
  isJarArchive,
  type ArchivePredicate
} from './filesystem-probe.js';
