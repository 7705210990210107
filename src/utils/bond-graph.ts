import type { Atom, Structure } from 'types';

/**
 * Undirected bond graph over atom ids.
 * Neighbor lists keep the order in which bonds were added, and nodes keep
 * the order in which they were added, so every walk over the graph is
 * deterministic.
 */
export class BondGraph {
  private nodes = new Map<number, Atom | undefined>();
  private adjacency = new Map<number, number[]>();
  private edgeKeys = new Set<string>();

  /**
   * Add a node to the graph.
   * @param id Atom id
   * @param atom Optional atom data
   */
  addNode(id: number, atom?: Atom): void {
    if (!this.nodes.has(id)) {
      this.nodes.set(id, atom);
      this.adjacency.set(id, []);
    } else if (atom !== undefined) {
      this.nodes.set(id, atom);
    }
  }

  /**
   * Add an undirected edge. Repeated bonds and self bonds are ignored.
   */
  addEdge(from: number, to: number): void {
    if (from === to) return;
    this.addNode(from);
    this.addNode(to);

    const key = this.getEdgeKey(from, to);
    if (this.edgeKeys.has(key)) return;

    this.edgeKeys.add(key);
    this.adjacency.get(from)?.push(to);
    this.adjacency.get(to)?.push(from);
  }

  hasNode(id: number): boolean {
    return this.nodes.has(id);
  }

  hasEdge(from: number, to: number): boolean {
    return this.edgeKeys.has(this.getEdgeKey(from, to));
  }

  getAtom(id: number): Atom | undefined {
    return this.nodes.get(id);
  }

  /**
   * Node ids in insertion order.
   */
  getNodes(): number[] {
    return Array.from(this.nodes.keys());
  }

  /**
   * Neighbor ids in bond order. The returned array is a copy.
   */
  getNeighbors(id: number): number[] {
    return [...(this.adjacency.get(id) ?? [])];
  }

  getDegree(id: number): number {
    return this.adjacency.get(id)?.length ?? 0;
  }

  nodeCount(): number {
    return this.nodes.size;
  }

  edgeCount(): number {
    return this.edgeKeys.size;
  }

  private getEdgeKey(from: number, to: number): string {
    const [a, b] = from < to ? [from, to] : [to, from];
    return `${a}-${b}`;
  }
}

/**
 * Build the bond graph of a structure: every atom becomes a node (in atom
 * order, isolated atoms included), every bond an edge.
 */
export function buildBondGraph(structure: Pick<Structure, 'atoms' | 'bonds'>): BondGraph {
  const graph = new BondGraph();

  for (const atom of structure.atoms) {
    graph.addNode(atom.id, atom);
  }

  for (const bond of structure.bonds) {
    if (!graph.hasNode(bond.atom1) || !graph.hasNode(bond.atom2)) {
      throw new Error(`Bond ${bond.atom1}-${bond.atom2} references an atom that is not in the structure`);
    }
    graph.addEdge(bond.atom1, bond.atom2);
  }

  return graph;
}
