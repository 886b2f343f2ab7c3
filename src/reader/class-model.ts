import type { types } from 'estree-toolkit';
import type { ClassModel, ConstructorParameter, FieldDescriptor } from '../types';
import type { ClassNode, LocatedClass } from '../source/locate';
import type { SourceComment } from '../source/parse';

import { ConfigurationError } from '../errors';
import { type JsDocTags, leadingJsDoc, parseJsDoc } from '../source/jsdoc';
import { memberName } from '../source/locate';
import { rangeOf } from '../source/parse';
import { extractStaticValue } from './extractor';

/**
 * Static class properties carrying serialization metadata.
 */
export const CLASS_ANNOTATION_PROPERTY = 'jsonSerializable';
export const FIELD_ANNOTATIONS_PROPERTY = 'jsonKeys';

/**
 * What the reader needs from the module around a class.
 */
export type ModuleContext = {
  readonly source: string;
  readonly comments: readonly SourceComment[];
  readonly classes: ReadonlyMap<string, LocatedClass>;
};

export type ClassAnnotations = {
  /**
   * `true` when the class declares `static jsonSerializable`.
   */
  readonly annotated: boolean;
  readonly annotation: unknown;
  readonly fieldAnnotations: unknown;
};

type FieldDraft = {
  name: string;
  type: string | null;
  isPrivate: boolean;
  isReadonly: boolean;
  isAccessor: boolean;
  hasGetter: boolean;
  hasSetter: boolean;
};

function tagsBefore(node: types.Node, context: ModuleContext): JsDocTags {
  return parseJsDoc(leadingJsDoc(context.source, context.comments, rangeOf(node)[0]));
}

function toDescriptor(draft: FieldDraft): FieldDescriptor {
  return {
    name: draft.name,
    type: draft.type ?? 'unknown',
    visibility: draft.isPrivate ? 'private' : 'public',
    isFinal: draft.isReadonly || (draft.isAccessor && !draft.hasSetter),
    hasGetter: draft.hasGetter,
    hasSetter: draft.hasSetter
  };
}

/**
 * Collects fields in declaration order. Accessor halves merge into one entry
 * positioned at the first half; JSDoc on either half applies.
 */
class FieldCollector {
  private readonly drafts = new Map<string, FieldDraft>();

  addField(name: string, tags: JsDocTags): void {
    if (this.drafts.has(name)) return;

    this.drafts.set(name, {
      name,
      type: tags.type,
      isPrivate: tags.private,
      isReadonly: tags.readonly,
      isAccessor: false,
      hasGetter: true,
      hasSetter: true
    });
  }

  addAccessor(name: string, kind: 'get' | 'set', tags: JsDocTags): void {
    const draft = this.drafts.get(name) ?? {
      name,
      type: null,
      isPrivate: false,
      isReadonly: false,
      isAccessor: true,
      hasGetter: false,
      hasSetter: false
    };

    if (kind === 'get') draft.hasGetter = true;
    else draft.hasSetter = true;

    draft.type ??= tags.type;
    draft.isPrivate ||= tags.private;
    draft.isReadonly ||= tags.readonly;
    this.drafts.set(name, draft);
  }

  descriptors(): FieldDescriptor[] {
    return [...this.drafts.values()].map(toDescriptor);
  }
}

function readParameters(
  params: readonly types.Pattern[],
  className: string
): ConstructorParameter[] {
  return params.map((param, index) => {
    if (param.type === 'Identifier') {
      return { name: param.name, isOptional: false };
    }
    if (param.type === 'AssignmentPattern' && param.left.type === 'Identifier') {
      return { name: param.left.name, isOptional: true };
    }
    throw new ConfigurationError(
      `Constructor parameter ${index + 1} of "${className}" must be an identifier, optionally with a default value.`,
      className
    );
  });
}

/**
 * Fields declared as `this.name = ...` at the top level of the constructor.
 */
function readConstructorAssignments(
  body: types.BlockStatement,
  fields: FieldCollector,
  context: ModuleContext
): void {
  for (const statement of body.body) {
    if (statement.type !== 'ExpressionStatement') continue;

    const { expression } = statement;
    if (
      expression.type !== 'AssignmentExpression' ||
      expression.operator !== '=' ||
      expression.left.type !== 'MemberExpression' ||
      expression.left.object.type !== 'ThisExpression'
    ) {
      continue;
    }

    const name = memberName(expression.left.property, expression.left.computed);
    if (name !== null) {
      fields.addField(name, tagsBefore(statement, context));
    }
  }
}

function supertypeOf(node: ClassNode, context: ModuleContext): string | null {
  const { superClass } = node;
  if (!superClass) return null;
  if (superClass.type === 'Identifier') return superClass.name;

  const [start, end] = rangeOf(superClass);
  return context.source.slice(start, end);
}

/**
 * Reads the `jsonSerializable` / `jsonKeys` static properties.
 */
export function readClassAnnotations(node: ClassNode, className: string): ClassAnnotations {
  let annotated = false;
  let annotation: unknown;
  let fieldAnnotations: unknown;

  for (const member of node.body.body) {
    if (member.type !== 'PropertyDefinition' || !member.static) continue;

    const name = memberName(member.key, member.computed);

    if (name === CLASS_ANNOTATION_PROPERTY) {
      annotated = true;
      annotation = member.value
        ? extractStaticValue(member.value, `${className}.${CLASS_ANNOTATION_PROPERTY}`)
        : true;
    } else if (name === FIELD_ANNOTATIONS_PROPERTY && member.value) {
      fieldAnnotations = extractStaticValue(
        member.value,
        `${className}.${FIELD_ANNOTATIONS_PROPERTY}`
      );
    }
  }

  return { annotated, annotation, fieldAnnotations };
}

/**
 * Builds the structural model of a top-level class.
 *
 * - Fields: public class fields, accessor pairs and `this.x = ...`
 *   assignments of the constructor. Static members, methods, `#private`
 *   and computed members are skipped.
 * - Types come from JSDoc `@type {T}`; fields without one are `unknown`.
 * - `@readonly` makes a field final, `@private` / `@protected` private.
 * - Fields of a superclass declared in the same module come first; a class
 *   without a constructor takes over its superclass' parameters.
 * - Type parameters come from `@template` on the class.
 *
 * @param seen - Classes on the current inheritance path (cycle guard).
 */
export function readClassModel(
  located: LocatedClass,
  context: ModuleContext,
  seen: ReadonlySet<string> = new Set()
): ClassModel {
  const { node, statement } = located;
  const name = node.id?.name;

  if (!name) {
    throw new ConfigurationError('Serializable classes must be named.', null);
  }

  const fields = new FieldCollector();
  let constructorParameters: ConstructorParameter[] | null = null;

  for (const member of node.body.body) {
    if (member.type === 'StaticBlock' || member.static) continue;

    const key = memberName(member.key, member.computed);
    if (key === null) continue;

    const tags = tagsBefore(member, context);

    if (member.type === 'PropertyDefinition') {
      fields.addField(key, tags);
    } else if (member.kind === 'constructor') {
      constructorParameters = readParameters(member.value.params, name);
      readConstructorAssignments(member.value.body, fields, context);
    } else if (member.kind === 'get' || member.kind === 'set') {
      fields.addAccessor(key, member.kind, tags);
    }
  }

  const supertype = supertypeOf(node, context);
  const parent =
    supertype !== null && !seen.has(supertype) ? context.classes.get(supertype) : undefined;
  const parentModel = parent
    ? readClassModel(parent, context, new Set([...seen, name]))
    : undefined;

  const own = fields.descriptors();
  const ownNames = new Set(own.map(field => field.name));
  const inherited = parentModel?.fields.filter(field => !ownNames.has(field.name)) ?? [];

  return {
    name,
    fields: [...inherited, ...own],
    constructorParameters: constructorParameters ?? parentModel?.constructorParameters ?? [],
    typeParameters: tagsBefore(statement, context).templates,
    supertype
  };
}
