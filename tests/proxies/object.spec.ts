import { ClassificationError, isWrapped, ObjectProxy, unwrap, wrapObject } from 'veneer';

describe('ObjectProxy', () => {
  class Point {
    constructor(
      readonly x: number,
      readonly y: number
    ) {}

    norm(): number {
      return Math.hypot(this.x, this.y);
    }
  }

  class Account {
    #balance = 10;

    get balance(): number {
      return this.#balance;
    }

    deposit(amount: number): number {
      this.#balance += amount;

      return this.#balance;
    }
  }

  test('forwards reads, writes and deletes to the target', () => {
    const target: { count: number; label?: string } = { count: 1 };
    const proxy = wrapObject(target);

    expect(proxy.count).toBe(1);

    proxy.count = 5;
    proxy.label = 'five';

    expect(target).toEqual({ count: 5, label: 'five' });

    delete proxy.label;

    expect('label' in target).toBe(false);
    expect(Object.keys(proxy)).toEqual(['count']);
  });

  test('answers type queries as the target', () => {
    const point = new Point(3, 4);
    const proxy = wrapObject(point);

    expect(proxy).toBeInstanceOf(Point);
    expect(Object.getPrototypeOf(proxy)).toBe(Point.prototype);
    expect(proxy.constructor).toBe(Point);
    expect(proxy.norm()).toBe(5);
    expect(Array.isArray(wrapObject([1, 2]))).toBe(true);
  });

  test('runs inherited methods against the target', () => {
    const proxy = wrapObject(new Account());

    expect(proxy.deposit(5)).toBe(15);
    expect(proxy.balance).toBe(15);
    expect(proxy.deposit).toBe(proxy.deposit);
    expect(proxy.deposit).not.toBe(Account.prototype.deposit);
    expect(proxy.deposit.name).toBe('bound deposit');
    expect(wrapObject(new Date(0)).getTime()).toBe(0);
  });

  test('forwards iteration and container access', () => {
    const map = wrapObject(new Map([['a', 1]]));
    const list = wrapObject([1, 2, 3]);

    expect(map.get('a')).toBe(1);
    expect(map.size).toBe(1);
    expect([...map]).toEqual([['a', 1]]);
    expect([...list]).toEqual([1, 2, 3]);
    expect(list.map((value) => value * 2)).toEqual([2, 4, 6]);
    expect(list[1]).toBe(2);
    expect(1 in list).toBe(true);
    expect(list.length).toBe(3);
  });

  test('forwards conversions used by operators', () => {
    const amount = wrapObject(new Number(3));

    expect(Number(amount)).toBe(3);
    expect(`${amount}`).toBe('3');
    expect(String(wrapObject([1, 2]))).toBe('1,2');
  });

  test('forwards calls and construction', () => {
    const add = function add(a: number, b: number): number {
      return a + b;
    };
    const proxy = wrapObject(add);
    const PointProxy = wrapObject(Point);

    expect(typeof proxy).toBe('function');
    expect(proxy(1, 2)).toBe(3);
    expect(proxy.call(null, 2, 3)).toBe(5);
    expect(proxy.name).toBe('add');
    expect(proxy.length).toBe(2);
    expect(String(proxy)).toBe(String(add));
    expect(new PointProxy(1, 2)).toBeInstanceOf(Point);
  });

  test('does not touch the target on construction', () => {
    const spy = vi.fn();
    const target = {
      get watched(): number {
        spy();

        return 1;
      }
    };

    wrapObject(target);

    expect(spy).not.toHaveBeenCalled();
  });

  test('reports refused writes the way the target does', () => {
    const target: { id: number } = Object.freeze({ id: 1 });
    const proxy = wrapObject(target);

    expect(Reflect.set(proxy, 'id', 2)).toBe(Reflect.set(target, 'id', 2));
    expect(Reflect.set(proxy, 'id', 2)).toBe(false);
    expect(Reflect.deleteProperty(proxy, 'id')).toBe(false);
    expect(target.id).toBe(1);
  });

  test('propagates errors raised by the target unchanged', () => {
    const error = new RangeError('locked');
    const target = {
      set locked(_: string) {
        throw error;
      },
      get broken(): number {
        throw new SyntaxError('broken');
      }
    };
    const proxy = wrapObject(target);

    expect(() => {
      proxy.locked = 'x';
    }).toThrow(error);
    expect(() => proxy.broken).toThrow(SyntaxError);
  });

  test('keeps reserved names on the proxy', () => {
    const target = { id: 1 };
    const proxy = wrapObject(target);

    expect(proxy.__wrapped__).toBe(target);
    expect(proxy.__wrapperState__).toBeUndefined();

    proxy.__wrapperState__ = { memo: 1 };

    expect(proxy.__wrapperState__).toEqual({ memo: 1 });
    expect('__wrapperState__' in target).toBe(false);
    expect(Reflect.set(proxy, '__wrapped__', {})).toBe(false);
    expect(Reflect.deleteProperty(proxy, '__wrapped__')).toBe(false);
    expect(proxy.__wrapped__).toBe(target);

    expect(Reflect.set(proxy, '_self_note', 'local')).toBe(true);
    expect(Reflect.get(proxy, '_self_note')).toBe('local');
    expect('_self_note' in proxy).toBe(true);
    expect('_self_note' in target).toBe(false);
    expect(Object.keys(proxy)).toEqual(['id']);
  });

  test('round-trips through unwrap by identity', () => {
    const target = { id: 1 };
    const proxy = wrapObject(target);
    const outer = wrapObject(proxy);

    expect(unwrap(proxy)).toBe(target);
    expect(unwrap(target)).toBe(target);
    expect(unwrap(outer)).toBe(proxy);
    expect(unwrap(unwrap(outer))).toBe(target);
    expect(isWrapped(proxy)).toBe(true);
    expect(isWrapped(target)).toBe(false);
    expect(isWrapped(42)).toBe(false);
  });

  test('lets objects inheriting from the proxy keep their own writes', () => {
    const target = { count: 1 };
    const child = Object.create(wrapObject(target));

    expect(child.count).toBe(1);

    child.count = 3;

    expect(child.count).toBe(3);
    expect(target.count).toBe(1);
  });

  test('rejects primitive targets', () => {
    expect(() => Reflect.construct(ObjectProxy, [42])).toThrow(ClassificationError);
    expect(() => Reflect.construct(ObjectProxy, [42])).toThrow('cannot wrap number 42: only objects and functions can be proxied');
  });

  test('lets subclasses intercept reads', () => {
    class Defaults<T extends object> extends ObjectProxy<T> {
      protected override read(property: PropertyKey): unknown {
        return super.read(property) ?? 'n/a';
      }
    }

    const proxy = new Defaults<{ name?: string; id: number }>({ id: 7 }).proxy;

    expect(proxy.id).toBe(7);
    expect(proxy.name).toBe('n/a');
  });
});
