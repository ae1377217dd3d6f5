// Inventory Comparator
// Set differences between the database inventories of two servers

import { ComparisonResult, Inventory, ServerComparison } from '../models/migration-models';
import { compareNames, ServerCatalog } from './database-catalog';

/**
 * Pure set algebra over two inventory snapshots. Names compare by exact
 * string equality; each output list is sorted.
 */
export function compareInventories(source: Inventory, destination: Inventory): ComparisonResult {
  const sourceSet = new Set(source);
  const destinationSet = new Set(destination);

  return {
    onlyInSource: [...sourceSet].filter(name => !destinationSet.has(name)).sort(compareNames),
    onlyInDestination: [...destinationSet].filter(name => !sourceSet.has(name)).sort(compareNames),
    common: [...sourceSet].filter(name => destinationSet.has(name)).sort(compareNames)
  };
}

/**
 * List both servers (system databases excluded) and diff them. Listing
 * failures propagate.
 */
export async function compareServers(catalog: ServerCatalog): Promise<ServerComparison> {
  const source = await catalog.listDatabases('source', true);
  const destination = await catalog.listDatabases('destination', true);

  return {
    source,
    destination,
    result: compareInventories(source, destination)
  };
}
