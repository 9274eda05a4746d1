import { existsSync, readFileSync, statSync } from "node:fs";
import { parse as parseYAML } from "yaml";

type TaxonomyNode = Record<string, unknown>;

const NODE_FIELDS = new Set(["title", "description"]);

function isMapping(value: unknown): value is TaxonomyNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Flatten a USAS tag taxonomy tree into `code → description`.
 *
 * Nodes that carry both `title` and `description` are tags; every other
 * key of a node is a child node. Entries keep document order.
 *
 * ```yaml
 * A:
 *   title: General and abstract terms
 *   description: ...
 *   A1:
 *     title: General
 *     description: ...
 * ```
 */
export function flattenTaxonomy(document: unknown): Map<string, string> {
  if (!isMapping(document)) {
    throw new Error("USAS tag taxonomy must be a mapping of tag names to tag data");
  }

  const descriptions = new Map<string, string>();
  // Children are pushed in reverse so they pop in document order
  const stack: [name: string, node: unknown][] = Object.entries(document).reverse();

  for (let entry = stack.pop(); entry; entry = stack.pop()) {
    const [name, node] = entry;
    if (!isMapping(node)) {
      throw new Error(`Expected a mapping for USAS tag ${name} but got: ${JSON.stringify(node)}`);
    }

    const hasTitle = "title" in node;
    const hasDescription = "description" in node;
    if (hasTitle && hasDescription) {
      if (descriptions.has(name)) {
        throw new Error(`Duplicate USAS tag name found: ${name}`);
      }
      descriptions.set(name, `title: ${String(node.title)} description: ${String(node.description)}`.trim());
    } else if (hasTitle) {
      throw new Error(`No description key found when it is expected for: ${name}`);
    } else if (hasDescription) {
      throw new Error(`No title key found when it is expected for: ${name}`);
    }

    const children = Object.entries(node).filter(([key]) => !NODE_FIELDS.has(key));
    for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
  }

  return descriptions;
}

/**
 * Load the USAS tag taxonomy YAML file and return `code → description`,
 * where a description reads `title: <title> description: <description>`.
 *
 * @param tagsToFilterOut - Codes removed from the result, e.g. `Z99`
 */
export function loadUsasMapper(
  filePath: string,
  tagsToFilterOut?: ReadonlySet<string>,
): Map<string, string> {
  if (!existsSync(filePath)) {
    throw new Error(`USAS tag descriptions file not found at: ${filePath}`);
  }
  if (!statSync(filePath).isFile()) {
    throw new Error(`USAS tag descriptions file is not a file: ${filePath}`);
  }

  const mapping = flattenTaxonomy(parseYAML(readFileSync(filePath, "utf-8")));
  if (tagsToFilterOut) {
    for (const code of tagsToFilterOut) mapping.delete(code);
  }
  return mapping;
}
