export { runVariablePass, toCustomPropertyName, convertValueReferences, buildRootBlock } from './variable-pass.js';
export { runPathPass, DEFAULT_IMAGE_BASE_URL } from './path-pass.js';
export { runFunctionPass, computeColorHelper, COLOR_HELPERS } from './function-pass.js';
export type { ColorHelper } from './function-pass.js';
export { runMixinPass, findMixinDefinitions, suggestMixin } from './mixin-pass.js';
export { MIXIN_LIBRARY, LIBRARY_MIXIN_NAMES, getLibraryMixin } from './mixin-library.js';
export { runImportPass } from './import-pass.js';
export { runContentCleaner, cleanContent } from './content-cleaner.js';
export { inferValueType, isColorLiteral } from './value-types.js';
