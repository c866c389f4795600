import { parse } from 'dot-properties';
import { readTextFile } from './fs.js';

/**
 * Load a Java-style .properties file into a flat key/value map.
 */
export async function readPropertiesFile(path: string): Promise<Map<string, string>> {
  const tree = parse(await readTextFile(path));
  const properties = new Map<string, string>();
  for (const [key, value] of Object.entries(tree)) {
    if (typeof value === 'string') {
      properties.set(key, value);
    }
  }
  return properties;
}
