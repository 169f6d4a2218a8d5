/**
 * Expression Validation
 * =====================
 * Syntactic checks applied before an expression is sent anywhere. Semantics
 * (whether operators and fields exist) are left to the remote service.
 */

export type ExpressionRejection =
  | 'empty'
  | 'unbalanced_parentheses'
  | 'too_simple'
  | 'no_function_call'
  | 'empty_call'
  | 'missing_operator';

export type ExpressionCheck =
  | { valid: true }
  | { valid: false; reason: ExpressionRejection; message: string };

const REJECTION_MESSAGES: Record<ExpressionRejection, string> = {
  empty: 'Expression is empty',
  unbalanced_parentheses: 'Unbalanced parentheses',
  too_simple: 'Expression too simple (just a number or variable name)',
  no_function_call: 'No function calls found in expression',
  empty_call: 'Empty function calls',
  missing_operator: 'Missing operator between terms',
};

const BARE_TOKEN = /^(?:\d+(?:\.\d*)?|[A-Za-z_][A-Za-z0-9_]*)$/;
const FUNCTION_CALL = /[A-Za-z_][A-Za-z0-9_]*\s*\(/;
const EMPTY_CALL = /\(\s*\)/;
const ADJACENT_GROUPS = /\)\s*\(/;

function reject(reason: ExpressionRejection): ExpressionCheck {
  return { valid: false, reason, message: REJECTION_MESSAGES[reason] };
}

/**
 * Parentheses must close in order and all be closed by the end
 */
export function hasBalancedParentheses(expression: string): boolean {
  let depth = 0;
  for (const char of expression) {
    if (char === '(') depth++;
    else if (char === ')') {
      depth--;
      if (depth < 0) return false;
    }
  }
  return depth === 0;
}

export function validateExpression(expression: string): ExpressionCheck {
  const trimmed = expression.trim();

  if (trimmed.length === 0) return reject('empty');
  if (!hasBalancedParentheses(trimmed)) return reject('unbalanced_parentheses');
  if (BARE_TOKEN.test(trimmed)) return reject('too_simple');
  if (!FUNCTION_CALL.test(trimmed)) return reject('no_function_call');
  if (EMPTY_CALL.test(trimmed)) return reject('empty_call');
  if (ADJACENT_GROUPS.test(trimmed)) return reject('missing_operator');

  return { valid: true };
}

export function isValidExpression(expression: string): boolean {
  return validateExpression(expression).valid;
}
