import {
  TensorIRExpression,
  TIR_INT,
  TIR_ZERO,
  TIR_ONE,
  TIR_FLOAT,
  TIR_VARIABLE,
  TIR_BUFFER,
  TIR_BINARY,
  TIR_ADD,
  TIR_SUB,
  TIR_MUL,
  TIR_DIV,
  TIR_MOD,
  TIR_AND,
  TIR_OR,
  TIR_XOR,
  TIR_LSHIFT,
  TIR_RSHIFT,
  TIR_MIN,
  TIR_MAX,
  TIR_COMPARE_SELECT,
  TIR_BROADCAST,
  TIR_RAMP,
  TIR_CAST,
  TIR_INTRINSICS,
  TIR_LOAD,
  intrinsicArity,
  isPureIntrinsic,
  isTensorIRIntrinsic,
  isTensorIRExpressionConstant,
  prettyPrintTensorIRExpression,
} from '../tensor-ir-expressions';
import {
  TIR_DTYPE,
  TIR_INT_TYPE,
  TIR_FLOAT_TYPE,
  prettyPrintTensorIRDtype,
} from '../tensor-ir-types';

import { Long } from 'tensorir-core-utils';

const x = TIR_VARIABLE('x', TIR_INT_TYPE);
const y = TIR_VARIABLE('y', TIR_FLOAT_TYPE);
const v = TIR_VARIABLE('v', TIR_DTYPE('Int', 4));
const A = TIR_BUFFER('A');

const print = (expression: TensorIRExpression): string =>
  prettyPrintTensorIRExpression(expression);
const printDtype = (expression: TensorIRExpression): string =>
  prettyPrintTensorIRDtype(expression.dtype);

it('immediates are normalized to their type', () => {
  expect(TIR_INT(300, 'Byte').value.toString()).toBe('44');
  expect(TIR_INT(Long.fromInt(-129), 'Char').value.toString()).toBe('127');
  expect(TIR_FLOAT(0.1).value).toBe(Math.fround(0.1));
  expect(TIR_FLOAT(0.1, 'Double').value).toBe(0.1);
});

it('immediates are printed with their type', () => {
  expect(print(TIR_ZERO)).toBe('0');
  expect(print(TIR_INT(-1))).toBe('-1');
  expect(print(TIR_INT(300, 'Byte'))).toBe('uint8(44)');
  expect(print(TIR_INT(1, 'Bool'))).toBe('bool(1)');
  expect(print(TIR_INT(Long.fromString('9007199254740993'), 'Long'))).toBe(
    'int64(9007199254740993)'
  );
  expect(print(TIR_FLOAT(1))).toBe('1.0f');
  expect(print(TIR_FLOAT(1.5))).toBe('1.5f');
  expect(print(TIR_FLOAT(1.5, 'Double'))).toBe('1.5');
  expect(print(TIR_FLOAT(2, 'Half'))).toBe('half(2.0)');
  expect(print(TIR_FLOAT(NaN, 'Double'))).toBe('NaN');
  expect(print(TIR_FLOAT(-Infinity))).toBe('-Infinityf');
});

it('binary expressions promote their operands', () => {
  expect(printDtype(TIR_ADD(x, TIR_ONE))).toBe('int');
  expect(printDtype(TIR_ADD(TIR_ONE, TIR_FLOAT(2)))).toBe('float');
  expect(printDtype(TIR_MUL(TIR_INT(1, 'Byte'), TIR_INT(1, 'Char')))).toBe('int16');
  expect(printDtype(TIR_SUB(v, TIR_BROADCAST(TIR_ONE, 4)))).toBe('intx4');
});

it('binary expressions are printed', () => {
  expect(print(TIR_ADD(x, TIR_ONE))).toBe('(x + 1)');
  expect(print(TIR_SUB(x, TIR_ONE))).toBe('(x - 1)');
  expect(print(TIR_MUL(x, TIR_ONE))).toBe('(x * 1)');
  expect(print(TIR_DIV(x, TIR_ONE))).toBe('(x / 1)');
  expect(print(TIR_MOD(x, TIR_ONE))).toBe('(x % 1)');
  expect(print(TIR_AND(x, TIR_ONE))).toBe('(x & 1)');
  expect(print(TIR_OR(x, TIR_ONE))).toBe('(x | 1)');
  expect(print(TIR_XOR(x, TIR_ONE))).toBe('(x ^ 1)');
  expect(print(TIR_LSHIFT(x, TIR_ONE))).toBe('(x << 1)');
  expect(print(TIR_RSHIFT(x, TIR_ONE))).toBe('(x >> 1)');
  expect(print(TIR_MAX(y, TIR_FLOAT(0), true))).toBe('Max(y, 0.0f, 1)');
  expect(print(TIR_MIN(y, TIR_FLOAT(0), false))).toBe('Min(y, 0.0f, 0)');
});

it('propagateNans only sticks to Min and Max', () => {
  expect(TIR_BINARY({ operator: 'Add', lhs: y, rhs: y, propagateNans: true }).propagateNans).toBe(
    false
  );
  expect(TIR_BINARY({ operator: 'Min', lhs: y, rhs: y, propagateNans: true }).propagateNans).toBe(
    true
  );
  expect(TIR_BINARY({ operator: 'Max', lhs: y, rhs: y }).propagateNans).toBe(false);
});

it('binary expressions reject malformed operands', () => {
  expect(() => TIR_ADD(v, x)).toThrow(
    '[MalformedInput]: Add expects operands with the same lanes, got 4 and 1.'
  );
  expect(() => TIR_ADD(A, x)).toThrow(
    '[UnsupportedDtype]: Scalar type `Handle` is not supported by type promotion.'
  );
});

it('compare select takes the type of its values', () => {
  const select = TIR_COMPARE_SELECT({
    operator: 'LT',
    lhs: x,
    rhs: TIR_INT(3),
    trueValue: TIR_FLOAT(1),
    falseValue: TIR_FLOAT(0),
  });
  expect(printDtype(select)).toBe('float');
  expect(print(select)).toBe('((x < 3) ? 1.0f : 0.0f)');
  expect(
    print(
      TIR_COMPARE_SELECT({ operator: 'NE', lhs: y, rhs: y, trueValue: x, falseValue: TIR_ZERO })
    )
  ).toBe('((y != y) ? x : 0)');
  expect(() =>
    TIR_COMPARE_SELECT({ operator: 'EQ', lhs: x, rhs: x, trueValue: v, falseValue: x })
  ).toThrow('CompareSelect expects operands with the same lanes, got 1 and 4.');
});

it('broadcast and ramp build vectors from scalars', () => {
  const broadcast = TIR_BROADCAST(TIR_INT(5), 4);
  expect(print(broadcast)).toBe('Broadcast(5, 4)');
  expect(printDtype(broadcast)).toBe('intx4');
  const ramp = TIR_RAMP(TIR_ZERO, TIR_FLOAT(0.5, 'Double'), 8);
  expect(print(ramp)).toBe('Ramp(0, 0.5, 8)');
  expect(printDtype(ramp)).toBe('doublex8');
  expect(() => TIR_BROADCAST(v, 2)).toThrow('Broadcast expects a scalar, got 4 lanes.');
  expect(() => TIR_BROADCAST(TIR_ONE, 0)).toThrow(
    'Broadcast expects a positive lane count, got 0.'
  );
  expect(() => TIR_RAMP(x, v, 4)).toThrow('Ramp expects a scalar, got 4 lanes.');
  expect(() => TIR_RAMP(x, TIR_ONE, 1.5)).toThrow('Ramp expects a positive lane count, got 1.5.');
});

it('cast keeps the lanes of its source', () => {
  const cast = TIR_CAST('Float', v);
  expect(printDtype(cast)).toBe('floatx4');
  expect(print(cast)).toBe('cast<float>(v)');
});

it('intrinsics compute in a floating point type', () => {
  expect(printDtype(TIR_INTRINSICS('sqrt', [x]))).toBe('float');
  expect(printDtype(TIR_INTRINSICS('pow', [TIR_FLOAT(2, 'Double'), TIR_FLOAT(3)]))).toBe('double');
  expect(printDtype(TIR_INTRINSICS('rand', []))).toBe('float');
  expect(printDtype(TIR_INTRINSICS('fabs', [TIR_CAST('Half', v)]))).toBe('halfx4');
  expect(print(TIR_INTRINSICS('pow', [TIR_FLOAT(2, 'Double'), TIR_FLOAT(3)]))).toBe(
    'pow(2.0, 3.0f)'
  );
  expect(print(TIR_INTRINSICS('rand', []))).toBe('rand()');
  expect(() => TIR_INTRINSICS('sqrt', [])).toThrow(
    'Intrinsic sqrt expects 1 parameter(s), got 0.'
  );
  expect(() => TIR_INTRINSICS('atan2', [y, v])).toThrow(
    'atan2 expects operands with the same lanes, got 1 and 4.'
  );
});

it('intrinsic helpers', () => {
  expect(intrinsicArity('rand')).toBe(0);
  expect(intrinsicArity('sin')).toBe(1);
  expect(intrinsicArity('remainder')).toBe(2);
  expect(isTensorIRIntrinsic('rand')).toBe(true);
  expect(isTensorIRIntrinsic('frac')).toBe(true);
  expect(isTensorIRIntrinsic('hypot')).toBe(false);
  expect(isPureIntrinsic('rand')).toBe(false);
  expect(isPureIntrinsic('exp')).toBe(true);
});

it('loads read from handle buffers', () => {
  const load = TIR_LOAD('Float', A, TIR_RAMP(TIR_ZERO, TIR_ONE, 4), TIR_BROADCAST(TIR_ONE, 4));
  expect(printDtype(load)).toBe('floatx4');
  expect(print(load)).toBe('A[Ramp(0, 1, 4), Broadcast(1, 4)]');
  expect(() => TIR_LOAD('Float', x, TIR_ZERO, TIR_ONE)).toThrow(
    'Load expects a handle buffer, but `x` is not.'
  );
  expect(() => TIR_LOAD('Float', A, v, TIR_ONE)).toThrow(
    'Load expects operands with the same lanes, got 4 and 1.'
  );
});

it('isTensorIRExpressionConstant tests', () => {
  expect(isTensorIRExpressionConstant(TIR_ONE)).toBe(true);
  expect(isTensorIRExpressionConstant(TIR_FLOAT(NaN))).toBe(true);
  expect(isTensorIRExpressionConstant(x)).toBe(false);
  expect(isTensorIRExpressionConstant(TIR_ADD(TIR_ONE, TIR_ONE))).toBe(true);
  expect(isTensorIRExpressionConstant(TIR_ADD(x, TIR_ONE))).toBe(false);
  expect(
    isTensorIRExpressionConstant(
      TIR_COMPARE_SELECT({
        operator: 'GE',
        lhs: TIR_ONE,
        rhs: TIR_ZERO,
        trueValue: TIR_ONE,
        falseValue: TIR_ZERO,
      })
    )
  ).toBe(true);
  expect(
    isTensorIRExpressionConstant(
      TIR_COMPARE_SELECT({
        operator: 'GE',
        lhs: TIR_ONE,
        rhs: TIR_ZERO,
        trueValue: x,
        falseValue: TIR_ZERO,
      })
    )
  ).toBe(false);
  expect(isTensorIRExpressionConstant(TIR_BROADCAST(TIR_INT(5), 4))).toBe(true);
  expect(isTensorIRExpressionConstant(TIR_BROADCAST(x, 4))).toBe(false);
  expect(isTensorIRExpressionConstant(TIR_RAMP(TIR_ZERO, TIR_ONE, 4))).toBe(true);
  expect(isTensorIRExpressionConstant(TIR_RAMP(x, TIR_ONE, 4))).toBe(false);
  expect(isTensorIRExpressionConstant(TIR_CAST('Float', TIR_ONE))).toBe(true);
  expect(isTensorIRExpressionConstant(TIR_INTRINSICS('sqrt', [TIR_FLOAT(1)]))).toBe(true);
  expect(isTensorIRExpressionConstant(TIR_INTRINSICS('rand', []))).toBe(false);
  expect(isTensorIRExpressionConstant(TIR_LOAD('Int', A, TIR_ZERO, TIR_ONE))).toBe(false);
});
