import { isComparison } from './field.js';
import type { FieldCriterion } from './field.js';
import type { DocumentId, DocumentSerializer, Parameters, ValueRenderer } from '../types.js';

export const noParams: Parameters = Object.freeze({});

/** `@id` parameter. */
export function idParam(id: DocumentId, render: ValueRenderer): Parameters {
  return { '@id': render(id) };
}

/** A parameter holding the serialized form of `value`. */
export function jsonParam<T>(name: string, value: T, serializer: DocumentSerializer): Parameters {
  return { [name]: serializer.serialize(value) };
}

/** The comparison value of a criterion; empty for existence tests. */
export function fieldParams(
  field: FieldCriterion,
  render: ValueRenderer,
  paramName = '@field',
): Parameters {
  return isComparison(field) ? { [paramName]: render(field.value) } : noParams;
}
