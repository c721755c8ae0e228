// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Entity = Brand<number, "Entity">;
export type BlockHash = Brand<string, "BlockHash">;

/** Simulated seconds since the simulation started. */
export type SimSeconds = number;

export const asEntity = (n: number): Entity => n as Entity;
export const asBlockHash = (s: string): BlockHash => s as BlockHash;
