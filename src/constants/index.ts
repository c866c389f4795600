/**
 * Shared constants for buildpath
 * Single source of truth for the file names and directory conventions of the
 * supported build systems.
 */

export const FILE_PATTERNS = {
  POM_XML: 'pom.xml',
  IVY_XML: 'ivy.xml',
  BUILD_PROPERTIES: 'build.properties',
  SETTINGS_FILES: ['buildpath.jsonc', 'buildpath.json'],
  ARCHIVE_EXTENSIONS: ['.jar', '.zip'],
} as const;

/**
 * Source layout shared by Maven, Ivy and sbt projects, relative to the project root.
 */
export const SOURCE_ROOT_CANDIDATES = [
  'src/main/scala',
  'src/main/java',
  'src/test/scala',
  'src/test/java',
] as const;

export const MAVEN_PATHS = {
  POM: FILE_PATTERNS.POM_XML,
  TARGET: 'target/classes',
} as const;

export const SBT_PATHS = {
  PROJECT_PROPERTIES: `project/${FILE_PATTERNS.BUILD_PROPERTIES}`,
  PARENT_PROJECT_PROPERTIES: `../project/${FILE_PATTERNS.BUILD_PROPERTIES}`,
  UNMANAGED_LIB: 'lib',
} as const;

export const SBT_PROPERTY_KEYS = {
  SCALA_VERSIONS: 'build.scala.versions',
  PROJECT_NAME: 'project.name',
} as const;

/**
 * Scala version assumed when build.properties names none.
 */
export const DEFAULT_SBT_SCALA_VERSION = '2.8.0';

/**
 * Ivy configuration every purpose falls back to.
 */
export const IVY_DEFAULT_CONF = 'default';

export const ENV_VARS = {
  VERBOSE: 'BUILDPATH_VERBOSE',
  MAVEN_COMMAND: 'BUILDPATH_MVN',
  IVY_JAR: 'BUILDPATH_IVY_JAR',
  JAVA_COMMAND: 'BUILDPATH_JAVA',
} as const;

export const DEFAULT_COMMANDS = {
  MAVEN: 'mvn',
  JAVA: 'java',
} as const;
