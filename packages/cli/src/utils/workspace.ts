import path from 'path';
import type { CultureGridConfig, ResourceEntity, ResourceEntry } from '@culturegrid/core';
import { CliError } from './errors.js';
import { ResourceFileStore } from './resource-files.js';

export interface Workspace {
  config: CultureGridConfig;
  resourcesDir: string;
  store: ResourceFileStore;
  entities: ResourceEntity[];
}

export async function loadWorkspace(config: CultureGridConfig, projectRoot: string): Promise<Workspace> {
  const resourcesDir = path.resolve(projectRoot, config.resourcesDir);
  const store = new ResourceFileStore(resourcesDir, {
    readOnlyCultures: config.readOnlyCultures,
    neutralCulture: config.neutralCulture,
    cultureOrder: config.cultures,
  });
  const entities = await store.loadAll();
  return { config, resourcesDir, store, entities };
}

export function findEntity(workspace: Workspace, name: string): ResourceEntity {
  const entity = workspace.entities.find((candidate) => candidate.name === name);
  if (!entity) {
    const known = workspace.entities.map((candidate) => candidate.name).join(', ') || 'none';
    throw new CliError(`Unknown resource "${name}". Known resources: ${known}`);
  }
  return entity;
}

export function findEntry(workspace: Workspace, entityName: string, key: string): ResourceEntry {
  const entity = findEntity(workspace, entityName);
  const entry = entity.getEntry(key);
  if (!entry) {
    throw new CliError(`Key "${key}" not found in ${entityName}`);
  }
  return entry;
}
