import ts from 'typescript';

import { Capability } from './capability.js';
import { guestThrowError, guestTypeError, thrownValueOf } from './extraction-error.js';
import {
  applyBinaryOperator,
  applyUnaryOperator,
  compoundAssignmentOperator,
  increment,
  toPrimitive,
  toPropertyKey,
  typeOf,
} from './operators.js';
import { Scope, type BindingKind, type ExecutionFrame } from './scope.js';

export type Completion =
  | { readonly kind: 'normal' }
  | { readonly kind: 'return'; readonly value: unknown }
  | { readonly kind: 'break' }
  | { readonly kind: 'continue' };

export interface InterpreterHooks {
  /** Answers a string-keyed read the receiver has no property for; `undefined` keeps the plain result. */
  readonly missingMember?: (target: object, key: string) => unknown;
}

interface Reference {
  get(): unknown;
  set(value: unknown): void;
}

interface Callee {
  readonly base: unknown;
  readonly value: unknown;
}

interface ClassDefinition {
  readonly node: ts.ClassLikeDeclaration;
  readonly scope: Scope;
  readonly parent: unknown;
  readonly derived: boolean;
  readonly prototype: object;
  readonly constructorNode?: ts.ConstructorDeclaration;
}

const NORMAL: Completion = { kind: 'normal' };
const BREAK: Completion = { kind: 'break' };
const CONTINUE: Completion = { kind: 'continue' };

const SHORT_CIRCUIT: unique symbol = Symbol('short-circuit');
type ChainResult = unknown;

const isObject = (value: unknown): value is object =>
  (typeof value === 'object' && value !== null) || typeof value === 'function';

const isIterable = (value: unknown): value is Iterable<unknown> =>
  typeof value === 'string' || (typeof value === 'object' && value !== null && Symbol.iterator in value);

const prototypeOf = (target: Function): object | null => {
  const prototype: unknown = Reflect.get(target, 'prototype');
  return isObject(prototype) ? prototype : Object.prototype;
};

const numericOf = (value: unknown): number | bigint => {
  const primitive = toPrimitive(value);
  return typeof primitive === 'bigint' ? primitive : Number(primitive);
};

const bindingKindOf = (list: ts.VariableDeclarationList): BindingKind => {
  if ((list.flags & ts.NodeFlags.Const) !== 0) {
    return 'const';
  }
  return (list.flags & ts.NodeFlags.Let) !== 0 ? 'let' : 'var';
};

const isAnonymousFunctionLike = (node: ts.Expression): boolean =>
  ts.isArrowFunction(node) ||
  ((ts.isFunctionExpression(node) || ts.isClassExpression(node)) && node.name === undefined);

const skipParentheses = (node: ts.Expression): ts.Expression =>
  ts.isParenthesizedExpression(node) ? skipParentheses(node.expression) : node;

/**
 * Evaluates the statements of a parsed program against an explicit scope chain.
 * Guest functions and classes become host functions that re-enter the
 * interpreter, so host built-ins (`Array.prototype.map`, `JSON.stringify`, ...)
 * can call back into guest code.
 */
export class Interpreter {
  private readonly templateObjects = new WeakMap<ts.Node, readonly string[]>();

  constructor(
    private readonly sourceFile: ts.SourceFile,
    private readonly hooks: InterpreterHooks = {},
  ) {}

  /** Declares `var` names of a function or program body and instantiates its function declarations. */
  hoist(statements: readonly ts.Statement[], scope: Scope): void {
    const variableScope = scope.variableScope();
    for (const name of collectVarNames(statements)) {
      if (!variableScope.has(name)) {
        variableScope.declare(name, undefined, 'var');
      }
    }
    this.hoistFunctions(statements, scope);
  }

  execute(statement: ts.Statement, scope: Scope): Completion {
    return this.executeStatement(statement, scope);
  }

  evaluate(expression: ts.Expression, scope: Scope): unknown {
    const value = this.evaluateChainPart(expression, scope);
    return value === SHORT_CIRCUIT ? undefined : value;
  }

  getMember(object: unknown, key: string | symbol): unknown {
    if (object instanceof Capability) {
      return typeof key === 'string' ? object.member(key) : undefined;
    }
    if (object === null || object === undefined) {
      throw guestTypeError(`Cannot read properties of ${String(object)} (reading '${String(key)}')`);
    }
    const target: object = Object(object);
    const value: unknown = Reflect.get(target, key, object);
    if (value === undefined && typeof key === 'string' && this.hooks.missingMember !== undefined && !(key in target)) {
      const fallback = this.hooks.missingMember(target, key);
      if (fallback !== undefined) {
        return fallback;
      }
    }
    return value;
  }

  setMember(object: unknown, key: string | symbol, value: unknown): void {
    if (object instanceof Capability) {
      if (typeof key === 'string') {
        object.assign(key, value);
      }
      return;
    }
    if (!isObject(object)) {
      throw guestTypeError(`Cannot set properties of ${String(object)} (setting '${String(key)}')`);
    }
    if (!Reflect.set(object, key, value)) {
      throw guestTypeError(`Cannot assign to read only property '${String(key)}' of object`);
    }
  }

  callValue(callee: unknown, thisArg: unknown, args: readonly unknown[], description = 'value'): unknown {
    if (callee instanceof Capability) {
      return callee.invoke(args);
    }
    if (typeof callee !== 'function') {
      throw guestTypeError(`${description} is not a function`);
    }
    return Reflect.apply(callee, thisArg, args);
  }

  constructValue(callee: unknown, args: readonly unknown[], description = 'value'): unknown {
    if (callee instanceof Capability) {
      return callee.invoke(args);
    }
    if (typeof callee !== 'function') {
      throw guestTypeError(`${description} is not a constructor`);
    }
    return Reflect.construct(callee, args);
  }

  // statements

  private hoistFunctions(statements: readonly ts.Statement[], scope: Scope): void {
    for (const statement of statements) {
      if (ts.isFunctionDeclaration(statement) && statement.name !== undefined && statement.body !== undefined) {
        const name = statement.name.text;
        scope.declare(name, this.createFunction(statement, scope, name), 'function');
      }
    }
  }

  private executeStatements(statements: readonly ts.Statement[], scope: Scope): Completion {
    for (const statement of statements) {
      const completion = this.executeStatement(statement, scope);
      if (completion.kind !== 'normal') {
        return completion;
      }
    }
    return NORMAL;
  }

  private executeBlock(block: ts.Block, scope: Scope): Completion {
    const blockScope = new Scope(scope, 'block');
    this.hoistFunctions(block.statements, blockScope);
    return this.executeStatements(block.statements, blockScope);
  }

  private executeStatement(statement: ts.Statement, scope: Scope): Completion {
    if (ts.isBlock(statement)) {
      return this.executeBlock(statement, scope);
    }
    if (ts.isExpressionStatement(statement)) {
      this.evaluate(statement.expression, scope);
      return NORMAL;
    }
    if (ts.isVariableStatement(statement)) {
      this.executeDeclarationList(statement.declarationList, scope);
      return NORMAL;
    }
    if (ts.isFunctionDeclaration(statement) || ts.isEmptyStatement(statement) || ts.isDebuggerStatement(statement)) {
      return NORMAL;
    }
    if (ts.isClassDeclaration(statement)) {
      const name = statement.name?.text ?? 'default';
      scope.declare(name, this.evaluateClass(statement, scope, name), 'class');
      return NORMAL;
    }
    if (ts.isIfStatement(statement)) {
      if (this.evaluate(statement.expression, scope)) {
        return this.executeStatement(statement.thenStatement, scope);
      }
      return statement.elseStatement === undefined ? NORMAL : this.executeStatement(statement.elseStatement, scope);
    }
    if (ts.isReturnStatement(statement)) {
      return {
        kind: 'return',
        value: statement.expression === undefined ? undefined : this.evaluate(statement.expression, scope),
      };
    }
    if (ts.isBreakStatement(statement) || ts.isContinueStatement(statement)) {
      if (statement.label !== undefined) {
        throw guestTypeError('Labelled break and continue are not supported.');
      }
      return ts.isBreakStatement(statement) ? BREAK : CONTINUE;
    }
    if (ts.isThrowStatement(statement)) {
      throw guestThrowError(this.evaluate(statement.expression, scope));
    }
    if (ts.isTryStatement(statement)) {
      return this.executeTry(statement, scope);
    }
    if (ts.isForStatement(statement)) {
      return this.executeFor(statement, scope);
    }
    if (ts.isForOfStatement(statement)) {
      return this.executeForEach(statement, [...this.iterate(this.evaluate(statement.expression, scope))], scope);
    }
    if (ts.isForInStatement(statement)) {
      return this.executeForEach(statement, this.enumerableKeys(this.evaluate(statement.expression, scope)), scope);
    }
    if (ts.isWhileStatement(statement)) {
      while (this.evaluate(statement.expression, scope)) {
        const completion = this.executeStatement(statement.statement, scope);
        if (completion.kind === 'break') break;
        if (completion.kind === 'return') return completion;
      }
      return NORMAL;
    }
    if (ts.isDoStatement(statement)) {
      do {
        const completion = this.executeStatement(statement.statement, scope);
        if (completion.kind === 'break') break;
        if (completion.kind === 'return') return completion;
      } while (this.evaluate(statement.expression, scope));
      return NORMAL;
    }
    if (ts.isSwitchStatement(statement)) {
      return this.executeSwitch(statement, scope);
    }
    throw guestTypeError(`Unsupported statement: ${ts.SyntaxKind[statement.kind]}.`, {
      line: this.lineOf(statement),
    });
  }

  private executeDeclarationList(list: ts.VariableDeclarationList, scope: Scope): void {
    const kind = bindingKindOf(list);
    for (const declaration of list.declarations) {
      if (declaration.initializer === undefined) {
        if (kind !== 'var') {
          this.bindName(declaration.name, undefined, scope, kind);
        }
        continue;
      }
      const name = ts.isIdentifier(declaration.name) ? declaration.name.text : '';
      this.bindName(declaration.name, this.evaluateNamed(declaration.initializer, scope, name), scope, kind);
    }
  }

  private executeTry(statement: ts.TryStatement, scope: Scope): Completion {
    let completion: Completion = NORMAL;
    let failure: { readonly error: unknown } | undefined;
    try {
      completion = this.executeBlock(statement.tryBlock, scope);
    } catch (error) {
      if (statement.catchClause === undefined) {
        failure = { error };
      } else {
        try {
          completion = this.executeCatch(statement.catchClause, error, scope);
        } catch (catchError) {
          failure = { error: catchError };
        }
      }
    }
    if (statement.finallyBlock !== undefined) {
      const finalCompletion = this.executeBlock(statement.finallyBlock, scope);
      if (finalCompletion.kind !== 'normal') {
        return finalCompletion;
      }
    }
    if (failure !== undefined) {
      throw failure.error;
    }
    return completion;
  }

  private executeCatch(clause: ts.CatchClause, error: unknown, scope: Scope): Completion {
    const catchScope = new Scope(scope, 'block');
    if (clause.variableDeclaration !== undefined) {
      this.bindName(clause.variableDeclaration.name, thrownValueOf(error), catchScope, 'let');
    }
    return this.executeBlock(clause.block, catchScope);
  }

  private executeFor(statement: ts.ForStatement, scope: Scope): Completion {
    let iterationScope = new Scope(scope, 'block');
    let perIteration = false;
    const { initializer } = statement;
    if (initializer !== undefined) {
      if (ts.isVariableDeclarationList(initializer)) {
        this.executeDeclarationList(initializer, iterationScope);
        perIteration = bindingKindOf(initializer) !== 'var';
      } else {
        this.evaluate(initializer, iterationScope);
      }
    }

    for (;;) {
      if (statement.condition !== undefined && !this.evaluate(statement.condition, iterationScope)) {
        break;
      }
      const completion = this.executeStatement(statement.statement, iterationScope);
      if (completion.kind === 'break') break;
      if (completion.kind === 'return') return completion;
      if (perIteration) {
        iterationScope = iterationScope.copy();
      }
      if (statement.incrementor !== undefined) {
        this.evaluate(statement.incrementor, iterationScope);
      }
    }
    return NORMAL;
  }

  private executeForEach(
    statement: ts.ForOfStatement | ts.ForInStatement,
    items: readonly unknown[],
    scope: Scope,
  ): Completion {
    const { initializer } = statement;
    for (const item of items) {
      const iterationScope = new Scope(scope, 'block');
      if (ts.isVariableDeclarationList(initializer)) {
        const declaration = initializer.declarations[0];
        if (declaration !== undefined) {
          this.bindName(declaration.name, item, iterationScope, bindingKindOf(initializer));
        }
      } else {
        this.assignTo(initializer, item, iterationScope);
      }
      const completion = this.executeStatement(statement.statement, iterationScope);
      if (completion.kind === 'break') break;
      if (completion.kind === 'return') return completion;
    }
    return NORMAL;
  }

  private executeSwitch(statement: ts.SwitchStatement, scope: Scope): Completion {
    const discriminant = this.evaluate(statement.expression, scope);
    const clauses = statement.caseBlock.clauses;
    const switchScope = new Scope(scope, 'block');
    this.hoistFunctions(
      clauses.flatMap((clause) => [...clause.statements]),
      switchScope,
    );

    let start = clauses.findIndex(
      (clause) => ts.isCaseClause(clause) && this.evaluate(clause.expression, switchScope) === discriminant,
    );
    if (start < 0) {
      start = clauses.findIndex((clause) => ts.isDefaultClause(clause));
    }
    if (start < 0) {
      return NORMAL;
    }

    for (const clause of clauses.slice(start)) {
      const completion = this.executeStatements(clause.statements, switchScope);
      if (completion.kind === 'break') break;
      if (completion.kind !== 'normal') return completion;
    }
    return NORMAL;
  }

  // bindings

  private declareBinding(scope: Scope, name: string, value: unknown, kind: BindingKind): void {
    if (kind === 'var') {
      scope.variableScope().declare(name, value, 'var');
      return;
    }
    scope.declare(name, value, kind);
  }

  private bindName(name: ts.BindingName, value: unknown, scope: Scope, kind: BindingKind): void {
    if (ts.isIdentifier(name)) {
      this.declareBinding(scope, name.text, value, kind);
      return;
    }

    if (ts.isObjectBindingPattern(name)) {
      const used: (string | symbol)[] = [];
      for (const element of name.elements) {
        if (element.dotDotDotToken !== undefined) {
          this.bindName(element.name, this.restOf(value, used), scope, kind);
          continue;
        }
        const key =
          element.propertyName === undefined
            ? ts.isIdentifier(element.name)
              ? element.name.text
              : ''
            : this.propertyKey(element.propertyName, scope);
        used.push(key);
        this.bindName(element.name, this.withDefault(this.getMember(value, key), element.initializer, scope, element.name), scope, kind);
      }
      return;
    }

    const items = [...this.iterate(value)];
    name.elements.forEach((element, index) => {
      if (ts.isOmittedExpression(element)) {
        return;
      }
      if (element.dotDotDotToken !== undefined) {
        this.bindName(element.name, items.slice(index), scope, kind);
        return;
      }
      this.bindName(element.name, this.withDefault(items[index], element.initializer, scope, element.name), scope, kind);
    });
  }

  private withDefault(
    value: unknown,
    initializer: ts.Expression | undefined,
    scope: Scope,
    target: ts.Node,
  ): unknown {
    if (value !== undefined || initializer === undefined) {
      return value;
    }
    return this.evaluateNamed(initializer, scope, ts.isIdentifier(target) ? target.text : '');
  }

  private restOf(value: unknown, used: readonly (string | symbol)[]): Record<string, unknown> {
    const rest: Record<string, unknown> = {};
    if (value instanceof Capability || !isObject(value)) {
      return rest;
    }
    for (const key of Object.keys(value)) {
      if (!used.includes(key)) {
        rest[key] = Reflect.get(value, key);
      }
    }
    return rest;
  }

  // assignment

  private reference(target: ts.Expression, scope: Scope): Reference {
    const node = skipParentheses(target);
    if (ts.isIdentifier(node)) {
      const name = node.text;
      return {
        get: () => scope.lookup(name),
        set: (value) => scope.assign(name, value),
      };
    }
    if (ts.isPropertyAccessExpression(node) || ts.isElementAccessExpression(node)) {
      const key = this.memberKey(node, scope);
      if (node.expression.kind === ts.SyntaxKind.SuperKeyword) {
        const frame = scope.currentFrame();
        return {
          get: () => this.superGet(frame, key),
          set: (value) => this.setMember(frame.thisValue, key, value),
        };
      }
      const object = this.evaluate(node.expression, scope);
      return {
        get: () => this.getMember(object, key),
        set: (value) => this.setMember(object, key, value),
      };
    }
    throw guestTypeError('Invalid assignment target.', { line: this.lineOf(target) });
  }

  private assignTo(target: ts.Expression, value: unknown, scope: Scope): void {
    const node = skipParentheses(target);
    if (ts.isObjectLiteralExpression(node)) {
      this.assignObjectPattern(node, value, scope);
      return;
    }
    if (ts.isArrayLiteralExpression(node)) {
      this.assignArrayPattern(node, value, scope);
      return;
    }
    this.reference(node, scope).set(value);
  }

  /** Assignment target with an optional `= default`, as written inside a destructuring pattern. */
  private assignWithDefault(target: ts.Expression, value: unknown, scope: Scope): void {
    if (ts.isBinaryExpression(target) && target.operatorToken.kind === ts.SyntaxKind.EqualsToken) {
      this.assignTo(target.left, this.withDefault(value, target.right, scope, target.left), scope);
      return;
    }
    this.assignTo(target, value, scope);
  }

  private assignObjectPattern(pattern: ts.ObjectLiteralExpression, value: unknown, scope: Scope): void {
    const used: (string | symbol)[] = [];
    for (const property of pattern.properties) {
      if (ts.isShorthandPropertyAssignment(property)) {
        const key = property.name.text;
        used.push(key);
        const member = this.withDefault(this.getMember(value, key), property.objectAssignmentInitializer, scope, property.name);
        scope.assign(key, member);
      } else if (ts.isPropertyAssignment(property)) {
        const key = this.propertyKey(property.name, scope);
        used.push(key);
        this.assignWithDefault(property.initializer, this.getMember(value, key), scope);
      } else if (ts.isSpreadAssignment(property)) {
        this.assignTo(property.expression, this.restOf(value, used), scope);
      } else {
        throw guestTypeError('Invalid destructuring assignment target.', { line: this.lineOf(property) });
      }
    }
  }

  private assignArrayPattern(pattern: ts.ArrayLiteralExpression, value: unknown, scope: Scope): void {
    const items = [...this.iterate(value)];
    pattern.elements.forEach((element, index) => {
      if (ts.isOmittedExpression(element)) {
        return;
      }
      if (ts.isSpreadElement(element)) {
        this.assignTo(element.expression, items.slice(index), scope);
        return;
      }
      this.assignWithDefault(element, items[index], scope);
    });
  }

  // expressions

  private evaluateNamed(expression: ts.Expression, scope: Scope, name: string): unknown {
    if (name !== '' && isAnonymousFunctionLike(expression)) {
      if (ts.isClassExpression(expression)) {
        return this.evaluateClass(expression, scope, name);
      }
      if (ts.isArrowFunction(expression) || ts.isFunctionExpression(expression)) {
        return this.createFunction(expression, scope, name);
      }
    }
    return this.evaluate(expression, scope);
  }

  private evaluateChainPart(expression: ts.Expression, scope: Scope): ChainResult {
    if (ts.isPropertyAccessExpression(expression) || ts.isElementAccessExpression(expression)) {
      return this.evaluateMember(expression, scope);
    }
    if (ts.isCallExpression(expression)) {
      return this.evaluateCall(expression, scope);
    }
    if (ts.isNonNullExpression(expression)) {
      return this.evaluateChainPart(expression.expression, scope);
    }
    return this.evaluateExpression(expression, scope);
  }

  private evaluateExpression(expression: ts.Expression, scope: Scope): unknown {
    if (ts.isIdentifier(expression)) {
      return scope.lookup(expression.text);
    }
    switch (expression.kind) {
      case ts.SyntaxKind.ThisKeyword: {
        const frame = scope.currentFrame();
        if (!frame.thisInitialized) {
          throw guestTypeError("Must call super constructor in derived class before accessing 'this'.");
        }
        return frame.thisValue;
      }
      case ts.SyntaxKind.NullKeyword:
        return null;
      case ts.SyntaxKind.TrueKeyword:
        return true;
      case ts.SyntaxKind.FalseKeyword:
        return false;
      default:
        break;
    }

    if (ts.isNumericLiteral(expression)) {
      return Number(expression.text.replace(/_/g, ''));
    }
    if (ts.isBigIntLiteral(expression)) {
      return BigInt(expression.text.slice(0, -1).replace(/_/g, ''));
    }
    if (ts.isStringLiteral(expression) || ts.isNoSubstitutionTemplateLiteral(expression)) {
      return expression.text;
    }
    if (ts.isRegularExpressionLiteral(expression)) {
      const closing = expression.text.lastIndexOf('/');
      return new RegExp(expression.text.slice(1, closing), expression.text.slice(closing + 1));
    }
    if (ts.isParenthesizedExpression(expression)) {
      return this.evaluate(expression.expression, scope);
    }
    if (ts.isTemplateExpression(expression)) {
      return expression.templateSpans.reduce(
        (text, span) => text + String(this.evaluate(span.expression, scope)) + span.literal.text,
        expression.head.text,
      );
    }
    if (ts.isTaggedTemplateExpression(expression)) {
      return this.evaluateTaggedTemplate(expression, scope);
    }
    if (ts.isObjectLiteralExpression(expression)) {
      return this.evaluateObjectLiteral(expression, scope);
    }
    if (ts.isArrayLiteralExpression(expression)) {
      return this.evaluateArrayLiteral(expression, scope);
    }
    if (ts.isArrowFunction(expression) || ts.isFunctionExpression(expression)) {
      return this.createFunction(expression, scope, expression.name?.text ?? '');
    }
    if (ts.isClassExpression(expression)) {
      return this.evaluateClass(expression, scope, expression.name?.text ?? '');
    }
    if (ts.isNewExpression(expression)) {
      const callee = this.evaluate(expression.expression, scope);
      const args = this.evaluateArguments(expression.arguments ?? [], scope);
      return this.constructValue(callee, args, this.describe(expression.expression));
    }
    if (ts.isPrefixUnaryExpression(expression)) {
      return this.evaluatePrefixUnary(expression, scope);
    }
    if (ts.isPostfixUnaryExpression(expression)) {
      const reference = this.reference(expression.operand, scope);
      const previous = numericOf(reference.get());
      reference.set(increment(previous, expression.operator === ts.SyntaxKind.PlusPlusToken ? 1 : -1));
      return previous;
    }
    if (ts.isTypeOfExpression(expression)) {
      return typeOf(this.evaluate(expression.expression, scope));
    }
    if (ts.isVoidExpression(expression)) {
      this.evaluate(expression.expression, scope);
      return undefined;
    }
    if (ts.isDeleteExpression(expression)) {
      return this.evaluateDelete(expression, scope);
    }
    if (ts.isConditionalExpression(expression)) {
      return this.evaluate(expression.condition, scope)
        ? this.evaluate(expression.whenTrue, scope)
        : this.evaluate(expression.whenFalse, scope);
    }
    if (ts.isBinaryExpression(expression)) {
      return this.evaluateBinary(expression, scope);
    }
    if (ts.isAsExpression(expression) || ts.isTypeAssertionExpression(expression) || ts.isSatisfiesExpression(expression)) {
      return this.evaluate(expression.expression, scope);
    }
    throw guestTypeError(`Unsupported expression: ${ts.SyntaxKind[expression.kind]}.`, {
      line: this.lineOf(expression),
    });
  }

  private memberKey(node: ts.PropertyAccessExpression | ts.ElementAccessExpression, scope: Scope): string | symbol {
    return ts.isPropertyAccessExpression(node)
      ? node.name.text
      : toPropertyKey(this.evaluate(node.argumentExpression, scope));
  }

  private evaluateMember(node: ts.PropertyAccessExpression | ts.ElementAccessExpression, scope: Scope): ChainResult {
    if (node.expression.kind === ts.SyntaxKind.SuperKeyword) {
      return this.superGet(scope.currentFrame(), this.memberKey(node, scope));
    }
    const object = this.evaluateChainPart(node.expression, scope);
    if (object === SHORT_CIRCUIT) {
      return SHORT_CIRCUIT;
    }
    if (node.questionDotToken !== undefined && (object === null || object === undefined)) {
      return SHORT_CIRCUIT;
    }
    return this.getMember(object, this.memberKey(node, scope));
  }

  private evaluateCallee(expression: ts.Expression, scope: Scope): Callee | typeof SHORT_CIRCUIT {
    const node =
      ts.isParenthesizedExpression(expression) && !ts.isOptionalChain(skipParentheses(expression))
        ? skipParentheses(expression)
        : expression;
    if (ts.isPropertyAccessExpression(node) || ts.isElementAccessExpression(node)) {
      if (node.expression.kind === ts.SyntaxKind.SuperKeyword) {
        const frame = scope.currentFrame();
        return { base: frame.thisValue, value: this.superGet(frame, this.memberKey(node, scope)) };
      }
      const object = this.evaluateChainPart(node.expression, scope);
      if (object === SHORT_CIRCUIT) {
        return SHORT_CIRCUIT;
      }
      if (node.questionDotToken !== undefined && (object === null || object === undefined)) {
        return SHORT_CIRCUIT;
      }
      return { base: object, value: this.getMember(object, this.memberKey(node, scope)) };
    }
    const value = this.evaluateChainPart(node, scope);
    return value === SHORT_CIRCUIT ? SHORT_CIRCUIT : { base: undefined, value };
  }

  private evaluateCall(node: ts.CallExpression, scope: Scope): ChainResult {
    if (node.expression.kind === ts.SyntaxKind.SuperKeyword) {
      return this.superCall(scope.currentFrame(), this.evaluateArguments(node.arguments, scope));
    }
    if (node.expression.kind === ts.SyntaxKind.ImportKeyword) {
      throw guestTypeError('Dynamic import is not supported.', { line: this.lineOf(node) });
    }
    const callee = this.evaluateCallee(node.expression, scope);
    if (callee === SHORT_CIRCUIT) {
      return SHORT_CIRCUIT;
    }
    if (node.questionDotToken !== undefined && (callee.value === null || callee.value === undefined)) {
      return SHORT_CIRCUIT;
    }
    const args = this.evaluateArguments(node.arguments, scope);
    return this.callValue(callee.value, callee.base, args, this.describe(node.expression));
  }

  private evaluateArguments(nodes: readonly ts.Expression[], scope: Scope): unknown[] {
    const args: unknown[] = [];
    for (const node of nodes) {
      if (ts.isSpreadElement(node)) {
        args.push(...this.iterate(this.evaluate(node.expression, scope)));
      } else {
        args.push(this.evaluate(node, scope));
      }
    }
    return args;
  }

  private evaluateTaggedTemplate(node: ts.TaggedTemplateExpression, scope: Scope): unknown {
    const callee = this.evaluateCallee(node.tag, scope);
    if (callee === SHORT_CIRCUIT) {
      throw guestTypeError('Tagged template on an optional chain.', { line: this.lineOf(node) });
    }
    const template = node.template;
    const values = ts.isNoSubstitutionTemplateLiteral(template)
      ? []
      : template.templateSpans.map((span) => this.evaluate(span.expression, scope));
    return this.callValue(callee.value, callee.base, [this.templateObject(template), ...values], this.describe(node.tag));
  }

  private templateObject(template: ts.TemplateLiteral): readonly string[] {
    const cached = this.templateObjects.get(template);
    if (cached !== undefined) {
      return cached;
    }
    const parts: readonly ts.TemplateLiteralLikeNode[] = ts.isNoSubstitutionTemplateLiteral(template)
      ? [template]
      : [template.head, ...template.templateSpans.map((span) => span.literal)];
    const strings = parts.map((part) => part.text);
    Object.defineProperty(strings, 'raw', { value: Object.freeze(parts.map((part) => part.rawText ?? part.text)) });
    const frozen = Object.freeze(strings);
    this.templateObjects.set(template, frozen);
    return frozen;
  }

  private evaluateObjectLiteral(node: ts.ObjectLiteralExpression, scope: Scope): Record<string | symbol, unknown> {
    const result: Record<string | symbol, unknown> = {};
    for (const property of node.properties) {
      if (ts.isPropertyAssignment(property)) {
        const key = this.propertyKey(property.name, scope);
        result[key] = this.evaluateNamed(property.initializer, scope, typeof key === 'string' ? key : '');
      } else if (ts.isShorthandPropertyAssignment(property)) {
        result[property.name.text] = scope.lookup(property.name.text);
      } else if (ts.isSpreadAssignment(property)) {
        this.spreadInto(result, this.evaluate(property.expression, scope));
      } else if (ts.isMethodDeclaration(property)) {
        const key = this.propertyKey(property.name, scope);
        result[key] = this.createFunction(property, scope, String(key), result);
      } else if (ts.isGetAccessorDeclaration(property) || ts.isSetAccessorDeclaration(property)) {
        this.defineAccessor(result, property, scope, true);
      }
    }
    return result;
  }

  private spreadInto(target: Record<string | symbol, unknown>, value: unknown): void {
    if (value instanceof Capability) {
      for (const key of value.keys()) {
        target[key] = value.member(key);
      }
      return;
    }
    if (value !== null && value !== undefined) {
      Object.assign(target, value);
    }
  }

  private evaluateArrayLiteral(node: ts.ArrayLiteralExpression, scope: Scope): unknown[] {
    const result: unknown[] = [];
    for (const element of node.elements) {
      if (ts.isSpreadElement(element)) {
        result.push(...this.iterate(this.evaluate(element.expression, scope)));
      } else if (ts.isOmittedExpression(element)) {
        result.length += 1;
      } else {
        result.push(this.evaluate(element, scope));
      }
    }
    return result;
  }

  private evaluatePrefixUnary(node: ts.PrefixUnaryExpression, scope: Scope): unknown {
    if (node.operator === ts.SyntaxKind.PlusPlusToken || node.operator === ts.SyntaxKind.MinusMinusToken) {
      const reference = this.reference(node.operand, scope);
      const next = increment(reference.get(), node.operator === ts.SyntaxKind.PlusPlusToken ? 1 : -1);
      reference.set(next);
      return next;
    }
    return applyUnaryOperator(node.operator, this.evaluate(node.operand, scope));
  }

  private evaluateDelete(node: ts.DeleteExpression, scope: Scope): boolean {
    const target = skipParentheses(node.expression);
    if (!ts.isPropertyAccessExpression(target) && !ts.isElementAccessExpression(target)) {
      this.evaluate(target, scope);
      return true;
    }
    const object = this.evaluate(target.expression, scope);
    const key = this.memberKey(target, scope);
    if (object instanceof Capability) {
      return typeof key === 'string' ? object.remove(key) : true;
    }
    if (!isObject(object)) {
      if (object === null || object === undefined) {
        throw guestTypeError(`Cannot convert ${String(object)} to object`);
      }
      return true;
    }
    if (!Reflect.deleteProperty(object, key)) {
      throw guestTypeError(`Cannot delete property '${String(key)}'`);
    }
    return true;
  }

  private evaluateBinary(node: ts.BinaryExpression, scope: Scope): unknown {
    const operator = node.operatorToken.kind;
    switch (operator) {
      case ts.SyntaxKind.AmpersandAmpersandToken: {
        const left = this.evaluate(node.left, scope);
        return left ? this.evaluate(node.right, scope) : left;
      }
      case ts.SyntaxKind.BarBarToken: {
        const left = this.evaluate(node.left, scope);
        return left ? left : this.evaluate(node.right, scope);
      }
      case ts.SyntaxKind.QuestionQuestionToken:
        return this.evaluate(node.left, scope) ?? this.evaluate(node.right, scope);
      case ts.SyntaxKind.CommaToken:
        this.evaluate(node.left, scope);
        return this.evaluate(node.right, scope);
      case ts.SyntaxKind.EqualsToken:
        return this.evaluateAssignment(node, scope);
      case ts.SyntaxKind.AmpersandAmpersandEqualsToken:
      case ts.SyntaxKind.BarBarEqualsToken:
      case ts.SyntaxKind.QuestionQuestionEqualsToken:
        return this.evaluateLogicalAssignment(node, operator, scope);
      default:
        break;
    }

    const compound = compoundAssignmentOperator(operator);
    if (compound !== undefined) {
      const reference = this.reference(node.left, scope);
      const value = applyBinaryOperator(compound, reference.get(), this.evaluate(node.right, scope));
      reference.set(value);
      return value;
    }

    const left = this.evaluate(node.left, scope);
    const right = this.evaluate(node.right, scope);
    return applyBinaryOperator(node.operatorToken.kind, left, right);
  }

  private evaluateAssignment(node: ts.BinaryExpression, scope: Scope): unknown {
    const target = skipParentheses(node.left);
    if (ts.isObjectLiteralExpression(target) || ts.isArrayLiteralExpression(target)) {
      const value = this.evaluate(node.right, scope);
      this.assignTo(target, value, scope);
      return value;
    }
    const reference = this.reference(target, scope);
    const value = this.evaluateNamed(node.right, scope, ts.isIdentifier(target) ? target.text : '');
    reference.set(value);
    return value;
  }

  private evaluateLogicalAssignment(node: ts.BinaryExpression, operator: ts.SyntaxKind, scope: Scope): unknown {
    const reference = this.reference(node.left, scope);
    const current = reference.get();
    const keep =
      operator === ts.SyntaxKind.AmpersandAmpersandEqualsToken
        ? !current
        : operator === ts.SyntaxKind.BarBarEqualsToken
          ? Boolean(current)
          : current !== null && current !== undefined;
    if (keep) {
      return current;
    }
    const value = this.evaluate(node.right, scope);
    reference.set(value);
    return value;
  }

  // functions and classes

  private createFunction(
    node: ts.FunctionLikeDeclaration,
    scope: Scope,
    name: string,
    homeObject?: object,
  ): Function {
    const interpreter = this;
    if (ts.isArrowFunction(node)) {
      const arrow = (...args: unknown[]): unknown => interpreter.invokeFunction(node, scope, undefined, args);
      Object.defineProperty(arrow, 'name', { value: name });
      return arrow;
    }

    const closure = ts.isFunctionExpression(node) && node.name !== undefined ? new Scope(scope, 'block') : scope;
    const constructible = ts.isFunctionDeclaration(node) || ts.isFunctionExpression(node);
    const guestFunction = function (this: unknown, ...args: unknown[]): unknown {
      const target: Function | undefined = new.target;
      if (target === undefined) {
        const frame: ExecutionFrame = { thisValue: this, thisInitialized: true, ...(homeObject === undefined ? {} : { homeObject }) };
        return interpreter.invokeFunction(node, closure, frame, args);
      }
      if (!constructible) {
        throw guestTypeError(`${name === '' ? 'anonymous' : name} is not a constructor`);
      }
      const thisValue: object = Object.create(prototypeOf(target));
      const result = interpreter.invokeFunction(node, closure, { thisValue, thisInitialized: true, newTarget: target }, args);
      return isObject(result) ? result : thisValue;
    };
    Object.defineProperty(guestFunction, 'name', { value: name });
    if (closure !== scope) {
      closure.declare(name, guestFunction, 'const');
    }
    return guestFunction;
  }

  private invokeFunction(
    node: ts.FunctionLikeDeclaration,
    closure: Scope,
    frame: ExecutionFrame | undefined,
    args: readonly unknown[],
  ): unknown {
    const scope = new Scope(closure, 'function', frame);
    if (frame !== undefined) {
      scope.declare('arguments', [...args], 'var');
    }
    node.parameters.forEach((parameter, index) => {
      const value =
        parameter.dotDotDotToken === undefined
          ? this.withDefault(args[index], parameter.initializer, scope, parameter.name)
          : args.slice(index);
      this.bindName(parameter.name, value, scope, 'param');
    });

    const body = node.body;
    if (body === undefined) {
      return undefined;
    }
    if (!ts.isBlock(body)) {
      return this.evaluate(body, scope);
    }
    this.hoist(body.statements, scope);
    const completion = this.executeStatements(body.statements, scope);
    return completion.kind === 'return' ? completion.value : undefined;
  }

  private evaluateClass(node: ts.ClassLikeDeclaration, scope: Scope, name: string): Function {
    const heritage = node.heritageClauses?.find((clause) => clause.token === ts.SyntaxKind.ExtendsKeyword)?.types[0];
    const parent = heritage === undefined ? undefined : this.evaluate(heritage.expression, scope);
    if (heritage !== undefined && parent !== null && typeof parent !== 'function' && !(parent instanceof Capability)) {
      throw guestTypeError(`Class extends value ${String(parent)} is not a constructor or null`, {
        line: this.lineOf(heritage),
      });
    }

    const classScope = new Scope(scope, 'block');
    const hostParent = typeof parent === 'function' && !(parent instanceof Capability) ? parent : undefined;
    const prototype: object = Object.create(
      hostParent !== undefined ? prototypeOf(hostParent) : parent === null ? null : Object.prototype,
    );
    const constructorNode = node.members.find(
      (member): member is ts.ConstructorDeclaration => ts.isConstructorDeclaration(member) && member.body !== undefined,
    );
    const definition: ClassDefinition = {
      node,
      scope: classScope,
      parent,
      derived: heritage !== undefined && parent !== null,
      prototype,
      ...(constructorNode === undefined ? {} : { constructorNode }),
    };

    const interpreter = this;
    const guestClass = function (...args: unknown[]): unknown {
      const target: Function | undefined = new.target;
      if (target === undefined) {
        throw guestTypeError(`Class constructor ${name} cannot be invoked without 'new'`);
      }
      return interpreter.constructInstance(definition, args, target);
    };
    Object.defineProperty(guestClass, 'name', { value: name });
    Object.defineProperty(guestClass, 'prototype', { value: prototype, writable: false });
    Object.defineProperty(prototype, 'constructor', { value: guestClass, writable: true, configurable: true });
    if (hostParent !== undefined) {
      Object.setPrototypeOf(guestClass, hostParent);
    }
    if (node.name !== undefined) {
      classScope.declare(node.name.text, guestClass, 'class');
    }

    for (const member of node.members) {
      const isStatic = ts.canHaveModifiers(member) && hasStaticModifier(ts.getModifiers(member));
      const home: object = isStatic ? guestClass : prototype;
      if (ts.isMethodDeclaration(member)) {
        if (member.body === undefined) continue;
        const key = this.propertyKey(member.name, classScope);
        Object.defineProperty(home, key, {
          value: this.createFunction(member, classScope, String(key), home),
          writable: true,
          configurable: true,
        });
      } else if (ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member)) {
        this.defineAccessor(home, member, classScope, false);
      } else if (ts.isPropertyDeclaration(member) && isStatic) {
        const key = this.propertyKey(member.name, classScope);
        const frameScope = new Scope(classScope, 'function', { thisValue: guestClass, thisInitialized: true, homeObject: guestClass });
        const value = member.initializer === undefined ? undefined : this.evaluate(member.initializer, frameScope);
        Object.defineProperty(home, key, { value, writable: true, enumerable: true, configurable: true });
      }
    }
    return guestClass;
  }

  private constructInstance(definition: ClassDefinition, args: readonly unknown[], newTarget: Function): object {
    const { constructorNode } = definition;
    if (!definition.derived) {
      const thisValue: object = Object.create(prototypeOf(newTarget));
      if (constructorNode === undefined) {
        return thisValue;
      }
      const frame: ExecutionFrame = { thisValue, thisInitialized: true, newTarget, homeObject: definition.prototype };
      const result = this.invokeFunction(constructorNode, definition.scope, frame, args);
      return isObject(result) ? result : thisValue;
    }

    if (constructorNode === undefined) {
      return this.constructParent(definition.parent, args, newTarget);
    }
    const frame: ExecutionFrame = {
      thisValue: undefined,
      thisInitialized: false,
      newTarget,
      parentConstructor: definition.parent,
      homeObject: definition.prototype,
    };
    const result = this.invokeFunction(constructorNode, definition.scope, frame, args);
    if (isObject(result)) {
      return result;
    }
    if (!frame.thisInitialized || !isObject(frame.thisValue)) {
      throw guestTypeError(
        "Must call super constructor in derived class before accessing 'this' or returning from derived constructor",
      );
    }
    return frame.thisValue;
  }

  private constructParent(parent: unknown, args: readonly unknown[], newTarget: Function): object {
    if (typeof parent === 'function' && !(parent instanceof Capability)) {
      const instance: unknown = Reflect.construct(parent, args, newTarget);
      if (isObject(instance)) {
        return instance;
      }
    }
    return Object.create(prototypeOf(newTarget));
  }

  private superCall(frame: ExecutionFrame, args: readonly unknown[]): undefined {
    if (frame.newTarget === undefined || !('parentConstructor' in frame)) {
      throw guestTypeError("'super' keyword unexpected here");
    }
    if (frame.thisInitialized) {
      throw guestTypeError('Super constructor may only be called once');
    }
    frame.thisValue = this.constructParent(frame.parentConstructor, args, frame.newTarget);
    frame.thisInitialized = true;
    return undefined;
  }

  private superGet(frame: ExecutionFrame, key: string | symbol): unknown {
    if (frame.homeObject === undefined) {
      throw guestTypeError("'super' keyword unexpected here");
    }
    const parentPrototype: unknown = Object.getPrototypeOf(frame.homeObject);
    return isObject(parentPrototype) ? Reflect.get(parentPrototype, key, frame.thisValue) : undefined;
  }

  private defineAccessor(
    target: object,
    node: ts.GetAccessorDeclaration | ts.SetAccessorDeclaration,
    scope: Scope,
    enumerable: boolean,
  ): void {
    const key = this.propertyKey(node.name, scope);
    const accessor = this.createFunction(node, scope, String(key), target);
    const existing = Object.getOwnPropertyDescriptor(target, key);
    Object.defineProperty(target, key, {
      configurable: true,
      enumerable,
      get: ts.isGetAccessorDeclaration(node) ? accessorCall(accessor) : existing?.get,
      set: ts.isSetAccessorDeclaration(node) ? accessorCall(accessor) : existing?.set,
    });
  }

  // helpers

  private propertyKey(name: ts.PropertyName, scope: Scope): string | symbol {
    if (ts.isComputedPropertyName(name)) {
      return toPropertyKey(this.evaluate(name.expression, scope));
    }
    if (ts.isNumericLiteral(name)) {
      return String(Number(name.text));
    }
    return name.text;
  }

  private iterate(value: unknown): Iterable<unknown> {
    if (value instanceof Capability) {
      return [];
    }
    if (!isIterable(value)) {
      throw guestTypeError(`${typeOf(value) === 'object' ? 'object' : String(value)} is not iterable`);
    }
    return value;
  }

  private enumerableKeys(value: unknown): string[] {
    if (value instanceof Capability) {
      return [...value.keys()];
    }
    if (value === null || value === undefined) {
      return [];
    }
    const target: object = Object(value);
    const keys: string[] = [];
    for (const key in target) {
      keys.push(key);
    }
    return keys;
  }

  private describe(node: ts.Node): string {
    const text = node.getText(this.sourceFile);
    return text.length > 60 ? `${text.slice(0, 57)}...` : text;
  }

  private lineOf(node: ts.Node): number {
    return this.sourceFile.getLineAndCharacterOfPosition(node.getStart(this.sourceFile)).line + 1;
  }
}

const hasStaticModifier = (modifiers: readonly ts.Modifier[] | undefined): boolean =>
  modifiers?.some((modifier) => modifier.kind === ts.SyntaxKind.StaticKeyword) ?? false;

function accessorCall(accessor: Function): (this: unknown, ...args: unknown[]) => unknown {
  return function (this: unknown, ...args: unknown[]): unknown {
    return Reflect.apply(accessor, this, args);
  };
}

/** `var` names declared anywhere in `statements`, not descending into nested functions or classes. */
export function collectVarNames(statements: readonly ts.Statement[]): string[] {
  const names = new Set<string>();

  const addBindingNames = (name: ts.BindingName): void => {
    if (ts.isIdentifier(name)) {
      names.add(name.text);
      return;
    }
    for (const element of name.elements) {
      if (!ts.isOmittedExpression(element)) {
        addBindingNames(element.name);
      }
    }
  };

  const visit = (node: ts.Node): void => {
    if (ts.isFunctionLike(node) || ts.isClassLike(node)) {
      return;
    }
    if (ts.isVariableDeclarationList(node) && (node.flags & ts.NodeFlags.BlockScoped) === 0) {
      for (const declaration of node.declarations) {
        addBindingNames(declaration.name);
      }
    }
    ts.forEachChild(node, visit);
  };

  for (const statement of statements) {
    visit(statement);
  }
  return [...names];
}
