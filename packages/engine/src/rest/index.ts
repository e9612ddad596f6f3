/**
 * @fileoverview Path template barrel exports
 *
 * @module @nestguard/engine/rest
 */

export {
    Parameter,
    ValueTypes,
    integerParameter,
    stringParameter,
    toStringPredicate,
    type ParameterDefinition,
    type PathParameter,
    type StringValidator,
    type ValueType,
    type ValueValidator,
} from "./Parameter.js";
export {
    PathTemplate,
    ResourceSegment,
    resolveReference,
    type NamedValues,
} from "./PathTemplate.js";
export {
    DEFAULT_CHARSET,
    percentDecode,
    percentEncode,
    type Charset,
} from "./percentEncoding.js";
