import { evaluate } from 'mathjs';
import { z } from 'zod';
import type { ToolDescriptor } from '../types.js';
import { InvalidExpressionError } from '../../utils/errors.js';

const ALLOWED_EXPRESSION = /^[0-9+\-*/().\s]+$/;
const ARITHMETIC_RUN = /[0-9+\-*/().\s]+/g;

const CalculatorArgsSchema = z.object({
  expression: z.string(),
});
export type CalculatorArgs = z.infer<typeof CalculatorArgsSchema>;

export interface CalculatorOutput {
  expression: string;
  result: number;
}

/**
 * Evaluate plain arithmetic. The character whitelist is checked before
 * mathjs sees the input, so identifiers, function calls, `^`, `%` and `=`
 * never reach the evaluator.
 */
export function calculate(expression: string): CalculatorOutput {
  const trimmed = expression.trim();
  if (trimmed.length === 0) {
    throw new InvalidExpressionError(expression, 'expression is empty');
  }
  if (!ALLOWED_EXPRESSION.test(trimmed)) {
    throw new InvalidExpressionError(expression, 'only digits, + - * / ( ) . and spaces are allowed');
  }

  let result: unknown;
  try {
    result = evaluate(trimmed);
  } catch (error) {
    throw new InvalidExpressionError(expression, error instanceof Error ? error.message : String(error));
  }

  if (typeof result !== 'number' || !Number.isFinite(result)) {
    throw new InvalidExpressionError(expression, 'result is not a finite number');
  }

  return { expression: trimmed, result };
}

/**
 * First maximal run of arithmetic characters that contains a digit.
 */
export function extractArithmeticExpression(query: string): string | null {
  for (const match of query.matchAll(ARITHMETIC_RUN)) {
    if (/\d/.test(match[0])) {
      return match[0].trim();
    }
  }
  return null;
}

export function createCalculatorTool(): ToolDescriptor<CalculatorArgs, CalculatorOutput> {
  return {
    name: 'calculator',
    description: 'Perform arithmetic calculations with + - * / and parentheses',
    parameters: CalculatorArgsSchema,
    handler: ({ expression }) => calculate(expression),
    fromQuery: (query) => ({ expression: extractArithmeticExpression(query) ?? query }),
    formatOutput: (output) => `${output.expression} = ${output.result}`,
  };
}
