/**
 * Statements for member declarations
 *
 * A class method or object member printed on its own is not a statement.
 * Members are printed inside a copy of their class or object literal that
 * holds only the members passed in.
 */

import * as t from '@babel/types';
import type { Declaration, Enclosure, MemberDeclaration } from '../types/index.js';

export function isMemberDeclaration(declaration: Declaration): declaration is MemberDeclaration {
  return (
    t.isClassMethod(declaration) ||
    t.isClassProperty(declaration) ||
    t.isObjectMethod(declaration) ||
    t.isObjectProperty(declaration)
  );
}

function isClassMember(member: MemberDeclaration): member is t.ClassMethod | t.ClassProperty {
  return t.isClassMethod(member) || t.isClassProperty(member);
}

function isObjectMember(member: MemberDeclaration): member is t.ObjectMethod | t.ObjectProperty {
  return t.isObjectMethod(member) || t.isObjectProperty(member);
}

/**
 * `class C { members }`, `const o = { members };`, or, when the enclosure
 * is unknown, `(class { members });` and `({ members });`
 */
export function enclose(enclosure: Enclosure | undefined, members: readonly MemberDeclaration[]): t.Statement {
  const classMembers = members.filter(isClassMember);
  const objectMembers = members.filter(isObjectMember);

  if (enclosure?.kind === 'class') {
    // The superclass stays so that `super(...)` calls remain valid
    return t.classDeclaration(
      t.identifier(enclosure.name),
      enclosure.node.superClass ?? null,
      t.classBody(classMembers)
    );
  }
  if (enclosure?.kind === 'object') {
    const literal = t.objectExpression(objectMembers);
    const { binding } = enclosure;
    return binding
      ? t.variableDeclaration(binding.kind, [t.variableDeclarator(t.identifier(binding.name), literal)])
      : t.expressionStatement(literal);
  }

  return objectMembers.length > 0
    ? t.expressionStatement(t.objectExpression(objectMembers))
    : t.expressionStatement(t.classExpression(null, null, t.classBody(classMembers)));
}
