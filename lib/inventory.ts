import { Component } from './types';

export class InventoryIndex {
  private readonly byId = new Map<string, Component>();

  static from(components: Iterable<Component>) {
    const index = new InventoryIndex();
    for (const component of components) {
      index.insert(component);
    }
    return index;
  }

  /** Later inserts with the same id replace earlier ones. */
  insert(component: Component) {
    this.byId.set(component.id, component);
  }

  lookup(id: string): Component | undefined {
    return this.byId.get(id);
  }

  get size() {
    return this.byId.size;
  }
}
