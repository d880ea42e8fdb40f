/**
 * ConfigValue
 *
 * The untyped configuration tree handed to plugins. Exactly five shapes exist;
 * tables keep insertion order and unique keys.
 */

export type ConfigString = { readonly kind: 'string'; readonly value: string };
export type ConfigInteger = { readonly kind: 'integer'; readonly value: number };
export type ConfigBoolean = { readonly kind: 'boolean'; readonly value: boolean };
export type ConfigSequence = { readonly kind: 'sequence'; readonly items: readonly ConfigValue[] };
export type ConfigTable = { readonly kind: 'table'; readonly entries: ReadonlyMap<string, ConfigValue> };

export type ConfigValue = ConfigString | ConfigInteger | ConfigBoolean | ConfigSequence | ConfigTable;

export type ConfigValueKind = ConfigValue['kind'];
