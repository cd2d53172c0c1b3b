import { loadGrammar, type LoadGrammarOptions } from "../schema/loadGrammar.js";
import { synthesize, type SynthesizeOptions } from "../synth/synthesize.js";
import type { TypeSet } from "../synth/types.js";
import { fingerprintGrammar } from "./fingerprint.js";
import { getSharedGrammarRegistry, type GrammarRegistry } from "./grammarRegistry.js";

export interface ProvideTypeSetOptions extends LoadGrammarOptions, SynthesizeOptions {
  /** Cache key. Defaults to a fingerprint of the description and extras. */
  readonly identity?: string;
  /** Defaults to the process-wide registry. */
  readonly registry?: GrammarRegistry;
}

/** Load, synthesize and cache the type set for a grammar description. */
export function provideTypeSet(description: unknown, options: ProvideTypeSetOptions = {}): TypeSet {
  const registry = options.registry ?? getSharedGrammarRegistry();
  const identity =
    options.identity ?? fingerprintGrammar({ description, extras: options.extras ?? [] });
  return registry.getOrBuildSync(identity, () =>
    synthesize(loadGrammar(description, options), options)
  );
}
