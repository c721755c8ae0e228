import { asEntity, type Entity } from "../types/brands";
import { SimulationError } from "./errors";

/** A component is any class instance; its constructor is its key. */
export type ComponentType<T> = abstract new (...args: never[]) => T;

type Bag = Map<Function, object>;

/**
 * Entity/component store for everything that exists in the simulation:
 * nodes and in-flight messages. Queries are evaluated eagerly and come back
 * in ascending entity order.
 */
export class World {
  private nextId = 0;
  private readonly entities = new Map<Entity, Bag>();

  spawn(...components: object[]): Entity {
    const entity = asEntity(this.nextId++);
    const bag: Bag = new Map();
    for (const c of components) bag.set(c.constructor, c);
    this.entities.set(entity, bag);
    return entity;
  }

  despawn(entity: Entity): boolean {
    return this.entities.delete(entity);
  }

  contains(entity: Entity): boolean {
    return this.entities.has(entity);
  }

  get size(): number {
    return this.entities.size;
  }

  get<T>(entity: Entity, type: ComponentType<T>): T | undefined {
    const c = this.entities.get(entity)?.get(type);
    return c instanceof type ? c : undefined;
  }

  has<T>(entity: Entity, type: ComponentType<T>): boolean {
    return this.get(entity, type) !== undefined;
  }

  /** Attaches (or replaces) a component of the same class. */
  insert(entity: Entity, component: object): void {
    const bag = this.entities.get(entity);
    if (!bag) throw SimulationError.unknownEntity(entity);
    bag.set(component.constructor, component);
  }

  remove<T>(entity: Entity, type: ComponentType<T>): T | undefined {
    const found = this.get(entity, type);
    if (found !== undefined) this.entities.get(entity)?.delete(type);
    return found;
  }

  entitiesWith(...types: ComponentType<unknown>[]): Entity[] {
    const out: Entity[] = [];
    for (const [entity, bag] of this.entities) {
      if (types.every((t) => bag.has(t))) out.push(entity);
    }
    return out.sort((a, b) => a - b);
  }

  query<A>(a: ComponentType<A>): Array<[Entity, A]>;
  query<A, B>(a: ComponentType<A>, b: ComponentType<B>): Array<[Entity, A, B]>;
  query<A, B, C>(
    a: ComponentType<A>,
    b: ComponentType<B>,
    c: ComponentType<C>,
  ): Array<[Entity, A, B, C]>;
  query(...types: ComponentType<unknown>[]): Array<[Entity, ...unknown[]]> {
    return this.entitiesWith(...types).map((entity): [Entity, ...unknown[]] => [
      entity,
      ...types.map((t) => this.get(entity, t)),
    ]);
  }
}
