import { compareCategories, escapeRegExp } from './store';

describe('compareCategories', () => {
  it('should order categories alphabetically regardless of case', () => {
    expect(['rent', 'Food', 'apples', 'Zoo'].sort(compareCategories)).toEqual([
      'apples',
      'Food',
      'rent',
      'Zoo',
    ]);
  });

  it('should put the capitalized variant first when only case differs', () => {
    expect(['food', 'Seafood', 'Food'].sort(compareCategories)).toEqual(['Food', 'food', 'Seafood']);
  });
});

describe('escapeRegExp', () => {
  it('should escape regex metacharacters', () => {
    expect(escapeRegExp('c++ (x)')).toBe('c\\+\\+ \\(x\\)');
  });

  it('should leave plain text unchanged', () => {
    expect(escapeRegExp('Food')).toBe('Food');
  });
});
