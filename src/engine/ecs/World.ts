import type { Component, EntityId, World } from '../types';

export class WorldImpl implements World {
  private entities: Map<EntityId, Map<string, Component>> = new Map();
  private nextEntityId = 0;

  createEntity(): EntityId {
    const id = `entity_${this.nextEntityId++}`;
    this.entities.set(id, new Map());
    return id;
  }

  removeEntity(entityId: EntityId): void {
    this.entities.delete(entityId);
  }

  hasEntity(entityId: EntityId): boolean {
    return this.entities.has(entityId);
  }

  addComponent<T extends Component>(entityId: EntityId, component: T): void {
    const components = this.entities.get(entityId);
    if (components) {
      components.set(component.type, component);
    }
  }

  getComponent<T extends Component>(entityId: EntityId, type: T['type']): T | undefined {
    const components = this.entities.get(entityId);
    return components?.get(type) as T | undefined;
  }

  // Same as getComponent, for systems that cannot proceed without it
  requireComponent<T extends Component>(entityId: EntityId, type: T['type']): T {
    const component = this.getComponent<T>(entityId, type);
    if (!component) {
      throw new Error(`Entity ${entityId} has no ${type} component`);
    }
    return component;
  }

  hasComponent(entityId: EntityId, type: string): boolean {
    const components = this.entities.get(entityId);
    return components?.has(type) ?? false;
  }

  removeComponent(entityId: EntityId, type: string): void {
    const components = this.entities.get(entityId);
    components?.delete(type);
  }

  query(...componentTypes: string[]): EntityId[] {
    const result: EntityId[] = [];
    for (const [entityId, components] of this.entities) {
      if (componentTypes.every((type) => components.has(type))) {
        result.push(entityId);
      }
    }
    return result;
  }

  getAllEntities(): EntityId[] {
    return Array.from(this.entities.keys());
  }

  clear(): void {
    this.entities.clear();
    this.nextEntityId = 0;
  }

  // For snapshot support; returns copies, never the live components
  getEntityComponents(entityId: EntityId): Record<string, Component> {
    const components = this.entities.get(entityId);
    if (!components) return {};
    return structuredClone(Object.fromEntries(components));
  }

  getNextEntityId(): number {
    return this.nextEntityId;
  }

  // Ids of removed entities are never reused, even across a snapshot load
  setNextEntityId(next: number): void {
    this.nextEntityId = Math.max(this.nextEntityId, next);
  }

  // For loading snapshots
  loadEntity(entityId: EntityId, components: Record<string, Component>): void {
    this.entities.set(entityId, new Map(Object.entries(structuredClone(components))));
    const match = entityId.match(/^entity_(\d+)$/);
    if (match) {
      const id = parseInt(match[1], 10);
      if (id >= this.nextEntityId) {
        this.nextEntityId = id + 1;
      }
    }
  }
}
