// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Hex = `0x${string}`;

/** Opaque 32-byte handle produced by the homomorphic backend. */
export type Ciphertext = Brand<Hex, "Ciphertext">;

export const asCiphertext = (h: Hex): Ciphertext => h as Ciphertext;
