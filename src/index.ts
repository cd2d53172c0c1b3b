export type { SourceRange, UntypedNode } from "./parser/untypedTree.js";
export { fromAntlrTree } from "./parser/fromAntlr.js";
export type { AntlrRecognizerInfo } from "./parser/fromAntlr.js";
export { fromTreeSitterNode, fromTreeSitterTree } from "./parser/fromTreeSitter.js";
export type {
  TreeSitterCursorLike,
  TreeSitterNodeLike,
  TreeSitterTreeLike,
} from "./parser/fromTreeSitter.js";
export {
  ConversionError,
  ConversionErrorCode,
  EquivalenceError,
  ReconstructionError,
  RegistryError,
  SchemaError,
  SynthesisError,
  TypedTreeError,
} from "./errors.js";
export type { ConversionErrorDetails, SynthesisSeverity } from "./errors.js";
export { loadGrammar } from "./schema/loadGrammar.js";
export type { LoadGrammarOptions } from "./schema/loadGrammar.js";
export { ERROR_KIND } from "./schema/types.js";
export type {
  FieldDescriptor,
  GrammarSchema,
  Multiplicity,
  NodeKindDefinition,
  NodeKindRef,
  NodeTypeDescription,
} from "./schema/types.js";
export { synthesize } from "./synth/synthesize.js";
export type { SynthesizeOptions } from "./synth/synthesize.js";
export { snakeToPascal } from "./synth/naming.js";
export type { AsClassName } from "./synth/naming.js";
export { renderDeclarations } from "./synth/renderDeclarations.js";
export type { RenderDeclarationsOptions } from "./synth/renderDeclarations.js";
export {
  LeafType,
  RecordType,
  TokenType,
  TypeSlot,
  UnionType,
} from "./synth/types.js";
export type {
  KindSet,
  LeafInit,
  RecordInit,
  SynthesizedField,
  SynthesizedType,
  TypeSet,
} from "./synth/types.js";
export { TypedBranch, TypedLeaf, TypedToken, isFieldSequence } from "./synth/typedNode.js";
export type { FieldMap, FieldValue, TriviaSegment, TypedNode } from "./synth/typedNode.js";
export { toTyped } from "./convert/toTyped.js";
export type { FieldAssignment, ToTypedOptions } from "./convert/toTyped.js";
export { toText } from "./convert/toText.js";
export type { ToTextOptions } from "./convert/toText.js";
export { ParseError } from "./convert/parseError.js";
export type { SourcePosition } from "./convert/parseError.js";
export { assertEquivalent, isEquivalent } from "./convert/equivalence.js";
export { GrammarRegistry, getSharedGrammarRegistry } from "./registry/grammarRegistry.js";
export type {
  GrammarBuild,
  GrammarRegistryOptions,
  RegistryEvent,
  RegistryEventListener,
  RegistryEventType,
} from "./registry/grammarRegistry.js";
export { fingerprintGrammar } from "./registry/fingerprint.js";
export { provideTypeSet } from "./registry/provideTypeSet.js";
export type { ProvideTypeSetOptions } from "./registry/provideTypeSet.js";
