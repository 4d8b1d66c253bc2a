import { createReadonlyView } from './readonly-view';

describe('createReadonlyView', () => {
  it('should read through to the backing array', () => {
    const backing = [1, 2];
    const view = createReadonlyView(backing);

    backing.push(3);

    expect(view).toHaveLength(3);
    expect([...view]).toEqual([1, 2, 3]);
    expect(view.indexOf(3)).toBe(2);
  });

  it('should throw on index assignment', () => {
    const view = createReadonlyView([1], 'numbers');

    expect(() => Reflect.set(view, 0, 5)).toThrow('Cannot modify numbers: it is a read-only view');
  });

  it('should throw on mutating array methods', () => {
    const backing = [3, 1, 2];
    const view = createReadonlyView(backing);

    expect(() => Reflect.apply(Array.prototype.push, view, [4])).toThrow(TypeError);
    expect(() => Reflect.apply(Array.prototype.sort, view, [])).toThrow(TypeError);
    expect(() => Reflect.apply(Array.prototype.pop, view, [])).toThrow(TypeError);
    expect(backing).toEqual([3, 1, 2]);
  });

  it('should throw on delete, defineProperty and freeze', () => {
    const view = createReadonlyView(['a']);

    expect(() => Reflect.deleteProperty(view, 0)).toThrow(TypeError);
    expect(() => Object.defineProperty(view, 'extra', { value: 1 })).toThrow(TypeError);
    expect(() => Object.freeze(view)).toThrow(TypeError);
    expect(() => Object.setPrototypeOf(view, null)).toThrow(TypeError);
  });

  it('should use a generic description by default', () => {
    const view = createReadonlyView([1]);

    expect(() => Reflect.set(view, 'length', 0)).toThrow('Cannot modify collection: it is a read-only view');
  });
});
