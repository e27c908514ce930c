import {
  TensorIRError,
  UnsupportedDtypeError,
  UnsupportedOperatorError,
  MalformedInputError,
} from '..';

describe('tensorir-core-errors', () => {
  it('UnsupportedDtypeError has expected messages', () => {
    const plain = new UnsupportedDtypeError('Handle');
    expect(plain).toBeInstanceOf(TensorIRError);
    expect(plain).toBeInstanceOf(Error);
    expect(plain.errorType).toBe('UnsupportedDtype');
    expect(plain.scalarType).toBe('Handle');
    expect(plain.message).toBe('[UnsupportedDtype]: Scalar type `Handle` is not supported.');
    expect(new UnsupportedDtypeError('Float', 'Xor').message).toBe(
      '[UnsupportedDtype]: Scalar type `Float` is not supported by Xor.'
    );
  });

  it('UnsupportedOperatorError has expected messages', () => {
    const e = new UnsupportedOperatorError('Pow');
    expect(e.name).toBe('UnsupportedOperator');
    expect(e.operator).toBe('Pow');
    expect(e.reason).toBe('Operator `Pow` is not supported.');
    expect(e.message).toBe('[UnsupportedOperator]: Operator `Pow` is not supported.');
  });

  it('MalformedInputError has expected messages', () => {
    expect(() => {
      throw new MalformedInputError('Lanes mismatch.');
    }).toThrow('[MalformedInput]: Lanes mismatch.');
  });
});
