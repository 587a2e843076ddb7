import { ADD, ARITHMETIC, CLEAR, SUB } from '../../test-helpers/actions';
import { converts, kind, variant } from './Action';

describe('kind', () => {
  it('matches actions carrying its tag', () => {
    expect(ADD.matches({ type: 'add' })).isTrue();
    expect(ADD.matches({ type: 'sub' })).isFalse();
  });

  it('is named after its tag unless a name is given', () => {
    expect(ADD.name).toEqual('add');
    expect(kind('add', 'plus').name).toEqual('plus');
  });
});

describe('variant', () => {
  it('accepts the tags of every member', () => {
    expect(ARITHMETIC.tags).toEqual(['add', 'sub']);
    expect(ARITHMETIC.matches({ type: 'sub' })).isTrue();
    expect(ARITHMETIC.matches({ type: 'clear' })).isFalse();
  });

  it('lists shared tags once', () => {
    expect(variant('all', ARITHMETIC, ADD, CLEAR).tags).toEqual(['add', 'sub', 'clear']);
  });
});

describe('converts', () => {
  it('converts a kind into itself', () => {
    expect(converts(ADD, ADD)).isTrue();
  });

  it('converts a member into its variant but not the reverse', () => {
    expect(converts(ADD, ARITHMETIC)).isTrue();
    expect(converts(ARITHMETIC, ADD)).isFalse();
  });

  it('rejects unrelated kinds', () => {
    expect(converts(ADD, SUB)).isFalse();
    expect(converts(CLEAR, ARITHMETIC)).isFalse();
  });
});
