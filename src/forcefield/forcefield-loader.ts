import { existsSync, readFileSync } from 'fs';
import { basename, extname, join, resolve } from 'path';
import type { ParameterSet } from 'types';
import { AtomTypeRegistry } from 'src/forcefield/atom-type-registry';
import type { AtomTypeRule } from 'src/typing/atom-type-rule';
import { DEFAULT_FORCEFIELD_DIR, FORCEFIELD_ALIASES, FORCEFIELD_DIR_ENV } from 'src/constants';
import { ForcefieldNotFoundError } from 'src/errors';

/**
 * A loaded force field: its atom types and which torsion tables it populates.
 */
export class Forcefield implements ParameterSet {
  private cachedRules: AtomTypeRule[] | null = null;

  constructor(
    readonly name: string,
    readonly source: string,
    readonly registry: AtomTypeRegistry,
    readonly hasDihedralTypes: boolean,
    readonly hasRbTorsionTypes: boolean,
  ) {}

  rules(): AtomTypeRule[] {
    if (!this.cachedRules) {
      this.cachedRules = this.registry.toRules();
    }
    return this.cachedRules;
  }
}

/**
 * Canonical force-field name for an accepted spelling, or null.
 */
export function resolveForcefieldName(
  name: string,
  aliases: Readonly<Record<string, string>> = FORCEFIELD_ALIASES,
): string | null {
  return aliases[name.trim().toLowerCase()] ?? null;
}

export class ForcefieldLoader {
  private dataDir: string;
  private cache: Map<string, Forcefield> = new Map();

  constructor(
    dataDir?: string,
    private readonly aliases: Readonly<Record<string, string>> = FORCEFIELD_ALIASES,
  ) {
    this.dataDir = dataDir || this.resolveDataDir();
  }

  private resolveDataDir(): string {
    return process.env[FORCEFIELD_DIR_ENV] || join(process.cwd(), DEFAULT_FORCEFIELD_DIR);
  }

  getDataDir(): string {
    return this.dataDir;
  }

  /**
   * Map a force-field name to its definition file: known aliases resolve to
   * `<dataDir>/<name>.xml`, anything else is taken as a path.
   */
  resolvePath(nameOrPath: string): string {
    const canonical = resolveForcefieldName(nameOrPath, this.aliases);
    const path = canonical ? join(this.dataDir, `${canonical}.xml`) : resolve(nameOrPath);
    if (!existsSync(path)) {
      throw new ForcefieldNotFoundError(path);
    }
    return path;
  }

  /**
   * Load and parse a force-field definition. Results are cached per file.
   */
  load(nameOrPath: string): Forcefield {
    const path = this.resolvePath(nameOrPath);
    const cached = this.cache.get(path);
    if (cached) {
      return cached;
    }

    const forcefield = parseForcefieldXML(readFileSync(path, 'utf-8'), path);
    this.cache.set(path, forcefield);
    if (process.env.VERBOSE) {
      console.log(`[FORCEFIELD] loaded ${forcefield.name} from ${path}: ${forcefield.registry.size} atom types`);
    }
    return forcefield;
  }

  clearCache(): void {
    this.cache.clear();
  }
}

// attribute list of a start tag; quoted values may contain '>'
const TAG_ATTRIBUTES = `((?:[^>"']|"[^"]*"|'[^']*')*?)`;

/**
 * Parse the atom types and torsion tables of a force-field XML document.
 *
 * Reads `<Type>` elements under `<AtomTypes>` (attributes name, class,
 * element, mass, def, overrides, desc) and checks whether
 * `<PeriodicTorsionForce>` / `<RBTorsionForce>` contain any `<Proper>` entry.
 * Comments are removed before scanning.
 */
export function parseForcefieldXML(xmlContent: string, source: string): Forcefield {
  const content = stripComments(xmlContent);
  const rootMatch = new RegExp(`<ForceField\\b${TAG_ATTRIBUTES}>`).exec(content);
  if (!rootMatch) {
    throw new Error(`No <ForceField> element in ${source}`);
  }
  const rootAttributes = parseAttributes(rootMatch[1] ?? '');
  const name = rootAttributes['name'] ?? basename(source, extname(source));

  const registry = new AtomTypeRegistry();
  const atomTypesRegex = new RegExp(`<AtomTypes\\b${TAG_ATTRIBUTES}>([\\s\\S]*?)</AtomTypes>`, 'g');
  const typeRegex = new RegExp(`<Type\\b${TAG_ATTRIBUTES}/?>`, 'g');
  let section;

  while ((section = atomTypesRegex.exec(content)) !== null) {
    const types = section[2] ?? '';
    let match;
    while ((match = typeRegex.exec(types)) !== null) {
      const attributes = parseAttributes(match[1] ?? '');
      const typeName = attributes['name'];
      const atomClass = attributes['class'];
      const mass = attributes['mass'];
      if (typeName === undefined || atomClass === undefined || mass === undefined) {
        throw new Error(`Atom type in ${source} is missing one of name, class, mass: <Type${match[1]}>`);
      }
      registry.register({
        name: typeName,
        atomClass,
        mass,
        element: attributes['element'],
        definition: attributes['def'],
        overrides: splitList(attributes['overrides']),
        description: attributes['desc'],
      });
    }
  }

  return new Forcefield(
    name,
    source,
    registry,
    declaresPropers(content, 'PeriodicTorsionForce'),
    declaresPropers(content, 'RBTorsionForce'),
  );
}

function stripComments(xmlContent: string): string {
  return xmlContent.replace(/<!--[\s\S]*?-->/g, '');
}

function declaresPropers(xmlContent: string, sectionName: string): boolean {
  const sectionRegex = new RegExp(
    `<${sectionName}\\b${TAG_ATTRIBUTES}(?:/>|>([\\s\\S]*?)</${sectionName}>)`,
    'g',
  );
  let section;
  while ((section = sectionRegex.exec(xmlContent)) !== null) {
    if (/<Proper\b/.test(section[2] ?? '')) {
      return true;
    }
  }
  return false;
}

function parseAttributes(attributesStr: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  const attrRegex = /([\w:-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;
  let match;

  while ((match = attrRegex.exec(attributesStr)) !== null) {
    const key = match[1];
    if (key === undefined) continue;
    attributes[key] = decodeEntities(match[2] ?? match[3] ?? '');
  }

  return attributes;
}

function decodeEntities(value: string): string {
  return value
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}
