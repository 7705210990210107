import { ATOMIC_NUMBERS } from 'src/constants';
import { AtomTypeRule } from 'src/typing/atom-type-rule';

export interface AtomTypeDefinition {
  name: string;
  atomClass: string;
  mass: number | string;
  element?: string;
  definition?: string; // pattern text
  overrides?: string[];
  description?: string;
}

export interface RegisteredAtomType {
  name: string;
  atomClass: string;
  mass: number;
  element: { symbol: string; atomicNumber: number } | null;
  definition?: string;
  overrides: string[];
  description?: string;
}

/**
 * Atom types declared by a force field, indexed by name and by class.
 * The empty class name '' collects every registered type.
 */
export class AtomTypeRegistry {
  private types = new Map<string, RegisteredAtomType>();
  private classes = new Map<string, Set<string>>([['', new Set()]]);

  register(definition: AtomTypeDefinition): RegisteredAtomType {
    const { name, atomClass } = definition;
    if (this.types.has(name)) {
      throw new Error(`Found multiple definitions for atom type: ${name}`);
    }

    const mass = typeof definition.mass === 'number' ? definition.mass : parseFloat(definition.mass);
    if (!Number.isFinite(mass)) {
      throw new Error(`Atom type ${name} has an invalid mass: ${definition.mass}`);
    }

    let element: RegisteredAtomType['element'] = null;
    if (definition.element) {
      const atomicNumber = ATOMIC_NUMBERS[definition.element];
      if (atomicNumber === undefined) {
        throw new Error(`Atom type ${name} has an unknown element: ${definition.element}`);
      }
      element = { symbol: definition.element, atomicNumber };
    }

    const registered: RegisteredAtomType = {
      name,
      atomClass,
      mass,
      element,
      definition: definition.definition,
      overrides: [...(definition.overrides ?? [])],
      description: definition.description,
    };
    this.types.set(name, registered);

    const typeSet = this.classes.get(atomClass) ?? new Set<string>();
    typeSet.add(name);
    this.classes.set(atomClass, typeSet);
    this.classes.get('')?.add(name);

    return registered;
  }

  get(name: string): RegisteredAtomType | undefined {
    return this.types.get(name);
  }

  has(name: string): boolean {
    return this.types.has(name);
  }

  names(): string[] {
    return Array.from(this.types.keys());
  }

  getTypesInClass(atomClass: string): string[] {
    return Array.from(this.classes.get(atomClass) ?? []);
  }

  get size(): number {
    return this.types.size;
  }

  /**
   * One rule per type that carries a definition, in registration order.
   * Throws PatternSyntaxError for a malformed definition.
   */
  toRules(): AtomTypeRule[] {
    const rules: AtomTypeRule[] = [];
    for (const type of this.types.values()) {
      if (type.definition) {
        rules.push(new AtomTypeRule(type.name, type.definition, type.overrides));
      }
    }
    return rules;
  }
}
