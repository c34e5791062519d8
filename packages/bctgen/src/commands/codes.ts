import { loadConfig, resolveRoot, taxonomyPath } from '../config.js';
import { loadTaxonomy } from '../taxonomy/loader.js';
import * as fmt from '../output/format.js';

export async function codes(isJson: boolean): Promise<void> {
  const root = resolveRoot();
  const entries = loadTaxonomy(taxonomyPath(root, loadConfig(root)));

  if (isJson) {
    console.log(JSON.stringify(entries, null, 2));
    return;
  }

  fmt.header(`Taxonomy — ${entries.length} code(s)`);
  console.log(fmt.table(
    ['Code', 'Label', 'Definition'],
    entries.map(e => [e.code, e.label, fmt.preview(e.definition, 80)]),
  ));
}
