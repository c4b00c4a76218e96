import { readFile, readdir } from 'fs/promises';
import { extname, join } from 'path';
import type { Logger } from '../types.js';
import { parseNodeDefinition } from './parser.js';
import type { NodeDefinition } from './schema.js';

/**
 * Node Definition Loader - Loads node definitions from filesystem
 */
export class NodeDefinitionLoader {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Load a single node definition from file
   *
   * @param filePath - Path to node definition YAML file
   * @returns Parsed node definition
   */
  async loadDefinition(filePath: string): Promise<NodeDefinition> {
    try {
      const content = await readFile(filePath, 'utf-8');
      const definition = parseNodeDefinition(content);

      this.logger?.debug(`Loaded node definition: ${definition.id} from ${filePath}`);

      return { ...definition, filepath: filePath };
    } catch (error) {
      this.logger?.warn(`Failed to load node definition from ${filePath}`, {
        error: error instanceof Error ? error.message : 'Unknown',
      });
      throw error;
    }
  }

  /**
   * Load all node definitions from a directory
   *
   * Invalid files are skipped with a warning; a missing directory yields an
   * empty list.
   *
   * @param dirPath - Directory path containing node definition YAML files
   */
  async loadFromDirectory(dirPath: string): Promise<NodeDefinition[]> {
    let files: string[];

    try {
      files = await readdir(dirPath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.logger?.debug(`Node definition directory not found: ${dirPath}`);
        return [];
      }
      throw error;
    }

    const yamlFiles = files.filter((f) => extname(f) === '.yaml' || extname(f) === '.yml').sort();

    this.logger?.debug(`Found ${yamlFiles.length} node definition files in ${dirPath}`);

    const definitions: NodeDefinition[] = [];
    const seen = new Set<string>();

    for (const file of yamlFiles) {
      try {
        const definition = await this.loadDefinition(join(dirPath, file));

        if (seen.has(definition.id)) {
          this.logger?.warn(`Skipping duplicate node definition: ${definition.id} (${file})`);
          continue;
        }

        seen.add(definition.id);
        definitions.push(definition);
      } catch (error) {
        // Log warning but continue loading other definitions
        this.logger?.warn(`Skipping invalid node definition: ${file}`, {
          error: error instanceof Error ? error.message : 'Unknown',
        });
      }
    }

    this.logger?.info(`Loaded ${definitions.length} node definitions from ${dirPath}`);

    return definitions;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
