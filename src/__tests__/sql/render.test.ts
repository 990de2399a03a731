import { describe, it, expect } from 'vitest';
import {
  attributeRef,
  avg,
  boolLiteral,
  divide,
  doubleLiteral,
  eq,
  gt,
  intLiteral,
  lt,
  minus,
  neq,
  not,
  or,
  plus,
  stringLiteral,
  stringLiteralFromSource,
  sum,
  times,
} from '../../sql/expr-builders';
import { renderExpr } from '../../sql/render';

describe('renderExpr', () => {
  describe('literals', () => {
    it('should render booleans as true/false', () => {
      expect(renderExpr(boolLiteral(true))).toBe('bool[true]');
      expect(renderExpr(boolLiteral(false))).toBe('bool[false]');
    });

    it('should render integers in decimal form', () => {
      expect(renderExpr(intLiteral(42))).toBe('int[42]');
      expect(renderExpr(intLiteral(-3))).toBe('int[-3]');
    });

    it('should render doubles with six fractional digits', () => {
      expect(renderExpr(doubleLiteral(1.5))).toBe('double[1.500000]');
      expect(renderExpr(doubleLiteral(-0.25))).toBe('double[-0.250000]');
      expect(renderExpr(doubleLiteral(2))).toBe('double[2.000000]');
    });

    it('should keep the decimal form for large and negative-zero doubles', () => {
      expect(renderExpr(doubleLiteral(1e21))).toBe('double[1000000000000000000000.000000]');
      expect(renderExpr(doubleLiteral(-1e22))).toBe('double[-10000000000000000000000.000000]');
      expect(renderExpr(doubleLiteral(-0))).toBe('double[-0.000000]');
    });

    it('should render string content raw', () => {
      expect(renderExpr(stringLiteral('abc'))).toBe('string[abc]');
      expect(renderExpr(stringLiteral('it is'))).toBe('string[it is]');
    });

    it('should strip exactly one delimiter from each end of source literals', () => {
      expect(renderExpr(stringLiteralFromSource("'abc'"))).toBe('string[abc]');
      expect(renderExpr(stringLiteralFromSource('"a b"'))).toBe('string[a b]');
      expect(renderExpr(stringLiteralFromSource("''x''"))).toBe("string['x']");
      expect(renderExpr(stringLiteralFromSource("''"))).toBe('string[]');
    });
  });

  describe('attribute references', () => {
    it('should render as [alias_attribute]', () => {
      expect(renderExpr(attributeRef('o', 'amount'))).toBe('[o_amount]');
    });
  });

  describe('operators', () => {
    const a = attributeRef('o', 'id');
    const b = intLiteral(7);

    it.each([
      ['plus', plus, '+ ([o_id], int[7])'],
      ['minus', minus, '- ([o_id], int[7])'],
      ['times', times, '* ([o_id], int[7])'],
      ['divide', divide, '/ ([o_id], int[7])'],
      ['gt', gt, '> ([o_id], int[7])'],
      ['lt', lt, '< ([o_id], int[7])'],
      ['eq', eq, '== ([o_id], int[7])'],
      ['neq', neq, '!= ([o_id], int[7])'],
      ['or', or, '|| ([o_id], int[7])'],
    ] as const)('should render %s', (_name, build, expected) => {
      expect(renderExpr(build(a, b))).toBe(expected);
    });

    it('should render unary operators', () => {
      expect(renderExpr(not(boolLiteral(false)))).toBe('!(bool[false])');
      expect(renderExpr(sum(a))).toBe('sum([o_id])');
      expect(renderExpr(avg(a))).toBe('avg([o_id])');
    });

    it('should render nested trees', () => {
      const expr = sum(plus(attributeRef('o', 'amount'), intLiteral(1)));
      expect(renderExpr(expr)).toBe('sum(+ ([o_amount], int[1]))');
    });
  });

  describe('determinism', () => {
    it('should distinguish differently associated trees', () => {
      const left = plus(plus(intLiteral(1), intLiteral(2)), intLiteral(3));
      const right = plus(intLiteral(1), plus(intLiteral(2), intLiteral(3)));

      expect(renderExpr(left)).toBe('+ (+ (int[1], int[2]), int[3])');
      expect(renderExpr(right)).toBe('+ (int[1], + (int[2], int[3]))');
    });

    it('should distinguish literal kinds with equal values', () => {
      expect(renderExpr(intLiteral(1))).not.toBe(renderExpr(doubleLiteral(1)));
      expect(renderExpr(stringLiteral('true'))).not.toBe(renderExpr(boolLiteral(true)));
    });

    it('should render the same tree identically on every call', () => {
      const expr = or(gt(attributeRef('c', 'balance'), doubleLiteral(0.5)), not(attributeRef('o', 'paid')));
      const first = renderExpr(expr);
      expect(renderExpr(expr)).toBe(first);
      expect(first).toBe('|| (> ([c_balance], double[0.500000]), !([o_paid]))');
    });
  });
});
