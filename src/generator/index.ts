/**
 * Factory graph generation
 *
 * @module generator
 * @category Generator
 */

export { createSession } from './session';
export type { GenerationSession, SessionOptions } from './session';

export { FactoryBuilder } from './builder';
export type { FactoryBuilderContext } from './builder';

export { FactoryRegistry, InstanceCache } from './registry';
export type { CachedInstance, Factory } from './registry';

export { ResolvedSchema } from './resolved-schema';

export { DEFAULT_FOREIGN_KEY_SUFFIX, localJoinColumns, resolveRelationships } from './resolver';
export type { ResolvedRelationships } from './resolver';

export { DEFAULT_STRING_LENGTH, ProviderRegistry, defaultProviders } from './providers';
export type { ProviderFactory, ProviderTable, ValueProvider } from './providers';

export { OverrideTable, loadOverrideFile, overrideProvider, parseOverrides } from './overrides';
export type { OverrideLookup, OverrideMap } from './overrides';
