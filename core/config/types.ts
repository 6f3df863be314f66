/**
 * Configuration types for solconf
 */

export interface SolconfConfig {
  /** Prefix marking a string scalar as an embedded expression */
  interpolationPrefix: string;
  /** Character that, placed before the prefix, makes it literal */
  escapePrefix: string;
  /** Expressions longer than this are rejected before parsing */
  maxExpressionLength: number;
  /** Extensions tried, in order, when a unit name has none */
  unitExtensions: string[];
  /** Raise instead of warn when overrides never matched a node */
  failOnUnusedOverrides: boolean;
}

/**
 * Shape of solconf.json / solconf.config.json. Every field is optional.
 */
export type SolconfConfigFile = Partial<SolconfConfig>;

export const DEFAULT_CONFIG: Readonly<SolconfConfig> = Object.freeze({
  interpolationPrefix: '$:',
  escapePrefix: '\\',
  maxExpressionLength: 10000,
  unitExtensions: ['.yaml', '.yml', '.json'],
  failOnUnusedOverrides: false
});
