import { describe, it, expect } from 'vitest';
import {
  calculate,
  extractArithmeticExpression,
  createCalculatorTool,
} from '../../../src/tools/builtin/calculator.js';
import { InvalidExpressionError } from '../../../src/utils/errors.js';

describe('calculator', () => {
  describe('calculate', () => {
    it('should evaluate simple addition', () => {
      expect(calculate('55+55')).toEqual({ expression: '55+55', result: 110 });
    });

    it('should respect parentheses and precedence', () => {
      expect(calculate(' (2 + 3) * 4 ').result).toBe(20);
      expect(calculate('2 + 3 * 4').result).toBe(14);
    });

    it('should keep fractional results', () => {
      expect(calculate('7 / 2').result).toBe(3.5);
    });

    it('should reject empty input', () => {
      expect(() => calculate('   ')).toThrow(InvalidExpressionError);
    });

    it('should reject characters outside plain arithmetic', () => {
      expect(() => calculate('2^3')).toThrow(InvalidExpressionError);
      expect(() => calculate('sqrt(4)')).toThrow(InvalidExpressionError);
      expect(() => calculate('x = 2')).toThrow(InvalidExpressionError);
    });

    it('should reject malformed expressions', () => {
      expect(() => calculate('2 +')).toThrow(InvalidExpressionError);
    });

    it('should reject non-finite results', () => {
      expect(() => calculate('1/0')).toThrow('result is not a finite number');
    });
  });

  describe('extractArithmeticExpression', () => {
    it('should pull the arithmetic out of a sentence', () => {
      expect(extractArithmeticExpression('What is 12 * 3?')).toBe('12 * 3');
    });

    it('should return the whole query when it is arithmetic', () => {
      expect(extractArithmeticExpression('55+55')).toBe('55+55');
    });

    it('should ignore operator runs without digits', () => {
      expect(extractArithmeticExpression('send an e-mail')).toBeNull();
    });
  });

  describe('createCalculatorTool', () => {
    it('should derive arguments from the query', () => {
      const tool = createCalculatorTool();
      expect(tool.fromQuery?.('please compute 8 / 4 now')).toEqual({ expression: '8 / 4' });
      expect(tool.fromQuery?.('no numbers here')).toEqual({ expression: 'no numbers here' });
    });

    it('should format the output as an equation', () => {
      const tool = createCalculatorTool();
      expect(tool.formatOutput?.({ expression: '8 / 4', result: 2 })).toBe('8 / 4 = 2');
    });
  });
});
