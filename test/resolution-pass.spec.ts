import { describe, it, expect } from 'vitest';
import {
  assign, binary, block, call, conditional, exprStmt, float, func, getter, identifier, ifStmt, int, isType, nil,
  not, programOf, returnStmt, setter, str, varDecl, bool
} from '../src/ast/builders';
import { collectHeaders } from '../src/validation/header-collector';
import { declareProgram } from '../src/validation/declaration-pass';
import { makeCodegenName, resolveProgram } from '../src/validation/resolution-pass';
import { ErrorCode, InternalError } from '../src/errors';
import type { CallExpression, Expression, Statement } from '../src/types';
import { analyzeFail, analyzeOk } from './helpers/analysis';
import { mainWith } from './helpers/programs';
import { createContext } from './helpers/context';

function expressionOf(stmt: Statement): Expression {
  if (stmt.kind === 'expression') return stmt.expression;
  if (stmt.kind === 'assignment') return stmt.value;
  throw new Error(`no expression in '${stmt.kind}'`);
}

describe('Resolution pass', () => {
  it('should flatten scope paths into codegen names', () => {
    expect(makeCodegenName('x', '1.2.3')).toBe('x_123');
    expect(makeCodegenName('count', '1')).toBe('count_1');
  });

  describe('codegen names', () => {
    it('should name locals after their block', () => {
      const outer = varDecl('x');
      const inner = varDecl('x');
      const use = identifier('x');
      analyzeOk(mainWith([outer, block([inner, exprStmt(call('Ifj.write', use))])]));

      expect(outer.codegenName).toBe('x_11');
      expect(outer.identifier.codegenName).toBe('x_11');
      expect(inner.codegenName).toBe('x_111');
      expect(use.codegenName).toBe('x_111');
      expect(use.resolvedAs).toBe('local');
    });

    it('should name parameters and functions', () => {
      const f = func('f', ['a'], [returnStmt(identifier('a'))]);
      const main = func('main', [], [exprStmt(call('f', int(1)))]);
      analyzeOk(programOf(main, f));

      expect(main.codegenName).toBe('main$0');
      expect(f.codegenName).toBe('f$1');
      expect(f.parameters[0].codegenName).toBe('a_12');
      const ret = f.body.body[0];
      if (ret.kind !== 'return' || !ret.argument || ret.argument.kind !== 'identifier') throw new Error('unexpected return');
      expect(ret.argument.codegenName).toBe('a_12');
      expect(ret.argument.resolvedAs).toBe('parameter');

      const callExpr = expressionOf(main.body.body[0]);
      if (callExpr.kind !== 'call') throw new Error('expected a call');
      expect(callExpr.codegenName).toBe('f$1');
      expect(callExpr.signature).toBe('f#1');
    });

    it('should name setter parameters', () => {
      const p = setter('p', 'value', []);
      analyzeOk(mainWith([], p));
      expect(p.parameter.codegenName).toBe('value_12');
    });

    it('should keep builtin names on calls', () => {
      const write = call('Ifj.write', str('hi'));
      analyzeOk(mainWith([exprStmt(write)]));
      expect(write.codegenName).toBe('Ifj.write');
      expect(write.signature).toBe('Ifj.write#1');
      expect(write.inferredType).toBe('null');
    });
  });

  describe('type learning', () => {
    it('should learn separate types for a shadowed variable', () => {
      const outer = varDecl('x');
      const inner = varDecl('x');
      const condition = binary('<', identifier('x'), int(2));
      analyzeOk(mainWith([
        outer,
        assign('x', int(1)),
        ifStmt(condition, [inner, assign('x', str('s'))])
      ]));

      expect(outer.dataType).toBe('int');
      expect(inner.dataType).toBe('string');
      expect(condition.inferredType).toBe('bool');
    });

    it('should widen and degrade', () => {
      const widened = varDecl('n');
      const degraded = varDecl('m');
      analyzeOk(mainWith([
        widened, assign('n', int(1)), assign('n', float(2.5)),
        degraded, assign('m', int(1)), assign('m', str('s'))
      ]));
      expect(widened.dataType).toBe('double');
      expect(degraded.dataType).toBe('unknown');
    });

    it('should adopt a type after null', () => {
      const v = varDecl('v');
      analyzeOk(mainWith([v, assign('v', nil()), assign('v', str('s'))]));
      expect(v.dataType).toBe('string');
    });

    it('should degrade a known type when an unknown value is assigned', () => {
      const v = varDecl('v');
      analyzeOk(mainWith([v, assign('v', int(1)), assign('v', call('Ifj.read_num'))]));
      expect(v.dataType).toBe('unknown');
    });

    it('should not check later uses against a type the variable has lost', () => {
      const y = varDecl('y');
      analyzeOk(mainWith([
        varDecl('x'), assign('x', int(1)), assign('x', call('Ifj.read_str')),
        y, assign('y', binary('+', identifier('x'), str('a'))),
        exprStmt(call('Ifj.length', identifier('x')))
      ]));
      expect(y.dataType).toBe('unknown');
    });

    it('should record the learned type on the assignment target', () => {
      const target = assign('v', float(1.5));
      analyzeOk(mainWith([varDecl('v'), target]));
      expect(target.target.inferredType).toBe('double');
      expect(target.target.codegenName).toBe('v_11');
    });
  });

  describe('expression typing', () => {
    it('should type repetition in either order once types are known', () => {
      const r = varDecl('r');
      analyzeOk(mainWith([varDecl('s'), assign('s', str('ab')), r, assign('r', binary('*', int(3), identifier('s')))]));
      expect(r.dataType).toBe('string');
    });

    it('should reject mixed known operands', () => {
      const error = analyzeFail(mainWith([
        varDecl('a'), assign('a', int(1)),
        varDecl('b'), assign('b', str('s')),
        varDecl('c'), assign('c', binary('+', identifier('a'), identifier('b')))
      ]), ErrorCode.EXPRESSION_TYPE);
      expect(error.message).toBe("operator '+' cannot be applied to types 'Int' and 'String'");
    });

    it('should skip checks involving unknown operands', () => {
      const sum = binary('+', identifier('r'), str('s'));
      analyzeOk(mainWith([varDecl('r'), assign('r', call('Ifj.read_num')), exprStmt(sum)]));
      expect(sum.inferredType).toBe('unknown');
    });

    it('should reject comparing known strings', () => {
      const error = analyzeFail(mainWith([
        varDecl('s'), assign('s', str('a')),
        ifStmt(binary('<', identifier('s'), identifier('s')), [])
      ]), ErrorCode.EXPRESSION_TYPE);
      expect(error.message).toBe("operator '<' cannot be applied to types 'String' and 'String'");
    });

    it('should type unary, conditional and is expressions', () => {
      const negation = not(identifier('x'));
      const choice = conditional(bool(true), int(1), str('a'));
      const test = isType(identifier('x'), 'Num');
      analyzeOk(mainWith([varDecl('x'), exprStmt(negation), exprStmt(choice), exprStmt(test)]));
      expect(negation.inferredType).toBe('bool');
      expect(choice.inferredType).toBe('unknown');
      expect(test.inferredType).toBe('bool');
    });

    it('should reject an unknown type name after is', () => {
      const error = analyzeFail(mainWith([exprStmt(isType(int(1), 'Bool'))]), ErrorCode.EXPRESSION_TYPE);
      expect(error.message).toBe("right side of 'is' must be one of Num, String, Null");
    });

    it('should reject a non-name after is', () => {
      const test = isType(int(1), 'Num');
      test.typeName = str('Num');
      analyzeFail(mainWith([exprStmt(test)]), ErrorCode.EXPRESSION_TYPE);
    });
  });

  describe('names', () => {
    it('should reject an undefined identifier', () => {
      const error = analyzeFail(mainWith([exprStmt(identifier('y'))]), ErrorCode.DEFINITION);
      expect(error.message).toBe("undefined identifier 'y'");
    });

    it('should resolve getters', () => {
      const read = identifier('p');
      analyzeOk(mainWith([exprStmt(call('Ifj.write', read))], getter('p', [returnStmt(int(1))])));
      expect(read.resolvedAs).toBe('getter');
      expect(read.inferredType).toBe('unknown');
    });

    it('should reject reading a setter-only property but allow writing it', () => {
      const error = analyzeFail(
        mainWith([exprStmt(call('Ifj.write', identifier('p')))], setter('p', 'v', [])),
        ErrorCode.DEFINITION
      );
      expect(error.message).toBe("property 'p' has a setter but no getter and cannot be read");

      const write = assign('p', int(5));
      analyzeOk(mainWith([write], setter('p', 'v', [])));
      expect(write.target.resolvedAs).toBe('setter');
    });

    it('should reject calls to undefined functions', () => {
      const error = analyzeFail(mainWith([exprStmt(call('missing', int(1)))]), ErrorCode.DEFINITION);
      expect(error.message).toBe("call to undefined function 'missing'");
    });

    it('should allow calls to functions declared later', () => {
      analyzeOk(mainWith([exprStmt(call('later'))], func('later', [], [])));
    });
  });

  describe('builtins', () => {
    it('should reject a disabled extension builtin', () => {
      const error = analyzeFail(mainWith([exprStmt(call('Ifj.read_bool'))]), ErrorCode.ARGUMENT_COUNT);
      expect(error.message).toBe('no builtin Ifj.read_bool taking 0 argument(s)');
    });

    it('should accept an enabled extension builtin', () => {
      const read: CallExpression = call('Ifj.read_bool');
      analyzeOk(mainWith([exprStmt(read)]), { extensions: { boolthen: true } });
      expect(read.codegenName).toBe('Ifj.read_bool');
    });

    it('should check arguments of known type', () => {
      const error = analyzeFail(
        mainWith([varDecl('n'), assign('n', int(5)), exprStmt(call('Ifj.length', identifier('n')))]),
        ErrorCode.ARGUMENT_COUNT
      );
      expect(error.message).toBe('argument 1 of Ifj.length must be a string, got Int');
    });

    it('should use builtin return types', () => {
      const len = varDecl('len');
      analyzeOk(mainWith([len, assign('len', call('Ifj.length', str('abc')))]));
      expect(len.dataType).toBe('int');
    });
  });

  it('should report the drifted path', () => {
    const main = func('main', [], []);
    const program = programOf(main);
    const context = createContext();
    collectHeaders(program, context);
    declareProgram(program, context);
    context.resetScopes();

    main.body.body.unshift(block([]));
    try {
      resolveProgram(program, context);
      expect.unreachable('resolution should fail on an unlabelled block');
    } catch (error) {
      expect(error).toBeInstanceOf(InternalError);
      expect(error instanceof Error ? error.message : '').toBe("scope path drift: block labelled 'none' was re-entered as '1.1.1'");
    }
  });
});
