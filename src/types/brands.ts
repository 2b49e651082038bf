// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Hex = `0x${string}`;
export type BlockHash = Brand<Hex, "BlockHash">;

export const asBlockHash = (h: Hex): BlockHash => h as BlockHash;
