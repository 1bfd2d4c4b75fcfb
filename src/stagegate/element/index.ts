export { DictElement, createElement, isElement, isRecord, resolvePath, type Element, type ElementInput, type Lookup } from './element';
export { parsePath, formatPath, type PathSegment } from './path';
