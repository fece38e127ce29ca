import { assert } from 'chai';
import * as B from '../../lib/bound-tree';
import { convertClosures } from '../../lib/closure-conversion';
import { stringifyConversionResult } from '../../lib/stringify-lowered';
import { assertSameCode } from '../common';
import {
  MethodBuilder, action, assign, bin, bool, call, callLocal, convert, field, func, int, lit, ref, thisRef, voidType,
} from './method-builder';

function lower(method: B.BoundMethod): string {
  return stringifyConversionResult(convertClosures(method));
}

suite('convertClosures', function () {
  test('Lambda without captures', () => {
    const method = new MethodBuilder('Run')
      .body(b => {
        b.local('f', func(int), b.lambda({}, l => l.ret(lit(1))));
      })
      .build();

    const result = convertClosures(method);
    assert.deepEqual(result.environments, []);
    assert.equal(result.methods.length, 1);
    assert.equal(result.methods[0].isStatic, true);
    assert.deepEqual(result.methods[0].container, { type: 'EnclosingType' });

    assertSameCode(stringifyConversionResult(result), `
      body {
        Func<int> f = new Func<int>(Run_lambda);
      }

      static int Run_lambda() {
        return 1;
      }
    `);
  });

  test('Lambda capturing a local', () => {
    const method = new MethodBuilder('Run')
      .body(b => {
        const x = b.local('x', int, lit(1));
        b.local('f', func(int), b.lambda({}, l => l.ret(bin('+', ref(x), lit(1)))));
        b.expr(assign(ref(x), lit(2)));
      })
      .build();

    assertSameCode(lower(method), `
      body {
        Run_Env0 $env0 = new Run_Env0();
        $env0.x = 1;
        Func<int> f = new Func<int>($env0.Run_lambda);
        $env0.x = 2;
      }

      class Run_Env0 {
        int x;
        int Run_lambda() {
          return this.x + 1;
        }
      }
    `);
  });

  test('Three levels of nesting', () => {
    const m = new MethodBuilder('Run', { returnType: func(int, func(int, int)) });
    const x = m.parameter('x', int);
    const method = m
      .body(b => {
        b.ret(b.lambda({
          name: 'outer',
          parameters: [['y', int]],
          returnType: func(int, int),
          delegateType: func(int, func(int, int)),
        }, (outer, [y]) => {
          outer.ret(outer.lambda({
            name: 'inner',
            parameters: [['z', int]],
            delegateType: func(int, int),
          }, (inner, [z]) => {
            inner.ret(bin('+', bin('+', ref(x), ref(y)), ref(z)));
          }));
        }));
      })
      .build();

    assertSameCode(lower(method), `
      body {
        Run_Env0 $env0 = new Run_Env0();
        $env0.x = x;
        return new Func<int, Func<int, int>>($env0.Run_outer);
      }

      class Run_Env0 {
        int x;
        Func<int, int> Run_outer(int y) {
          Run_Env1 $env1 = new Run_Env1();
          $env1.$parent = this;
          $env1.y = y;
          return new Func<int, int>($env1.Run_inner);
        }
      }

      class Run_Env1 {
        int y;
        Run_Env0 $parent;
        int Run_inner(int z) {
          return (this.$parent.x + this.y) + z;
        }
      }
    `);
  });

  test('Mutually recursive local functions without captures', () => {
    const m = new MethodBuilder('Run', { returnType: bool });
    const even = m.reserveFunction();
    const odd = m.reserveFunction();
    const method = m
      .body(b => {
        b.localFunction({ id: even, name: 'even', parameters: [['n', int]], returnType: bool }, (f, [n]) => {
          f.if(bin('==', ref(n), lit(0)), then => then.ret(lit(true)));
          f.ret(callLocal(odd, bin('-', ref(n), lit(1))));
        });
        b.localFunction({ id: odd, name: 'odd', parameters: [['n', int]], returnType: bool }, (f, [n]) => {
          f.if(bin('==', ref(n), lit(0)), then => then.ret(lit(false)));
          f.ret(callLocal(even, bin('-', ref(n), lit(1))));
        });
        b.ret(callLocal(even, lit(10)));
      })
      .build();

    const result = convertClosures(method);
    assert.deepEqual(result.environments, []);
    assertSameCode(stringifyConversionResult(result), `
      body {
        return Run_even(10);
      }

      static bool Run_even(int n) {
        if (n == 0) {
          return true;
        }
        return Run_odd(n - 1);
      }

      static bool Run_odd(int n) {
        if (n == 0) {
          return false;
        }
        return Run_even(n - 1);
      }
    `);
  });

  test('Local function capturing a local uses a struct passed by reference', () => {
    const method = new MethodBuilder('Run', { returnType: int })
      .body(b => {
        const count = b.local('count', int, lit(0));
        const increment = b.localFunction({ name: 'increment', parameters: [['by', int]], returnType: voidType }, (f, [by]) => {
          f.expr(assign(ref(count), bin('+', ref(count), ref(by))));
        });
        b.expr(callLocal(increment, lit(2)));
        b.ret(ref(count));
      })
      .build();

    const result = convertClosures(method);
    assert.deepEqual(result.methods[0].parameters.map(p => p.isRef), [false, true]);
    assertSameCode(stringifyConversionResult(result), `
      body {
        Run_Env0 $env0 = default(Run_Env0);
        $env0.count = 0;
        Run_increment(2, ref $env0);
        return $env0.count;
      }

      struct Run_Env0 {
        int count;
      }

      static void Run_increment(int by, ref Run_Env0 $env0) {
        $env0.count = $env0.count + by;
      }
    `);
  });

  test('Struct environment is forwarded between local functions', () => {
    const m = new MethodBuilder('Run', { returnType: int });
    const bump = m.reserveFunction();
    const method = m
      .body(b => {
        const n = b.local('n', int, lit(0));
        const twice = b.localFunction({ name: 'twice', returnType: voidType }, f => {
          f.expr(callLocal(bump));
          f.expr(callLocal(bump));
        });
        b.localFunction({ id: bump, name: 'bump', returnType: voidType }, f => {
          f.expr(assign(ref(n), bin('+', ref(n), lit(1))));
        });
        b.expr(callLocal(twice));
        b.ret(ref(n));
      })
      .build();

    assertSameCode(lower(method), `
      body {
        Run_Env0 $env0 = default(Run_Env0);
        $env0.n = 0;
        Run_twice(ref $env0);
        return $env0.n;
      }

      struct Run_Env0 {
        int n;
      }

      static void Run_bump(ref Run_Env0 $env0) {
        $env0.n = $env0.n + 1;
      }

      static void Run_twice(ref Run_Env0 $env0) {
        Run_bump(ref $env0);
        Run_bump(ref $env0);
      }
    `);
  });

  test('Lambda capturing only `this` needs no environment', () => {
    const method = new MethodBuilder('Run', { isStatic: false })
      .body(b => {
        b.block(outer => {
          outer.block(inner => {
            inner.local('f', func(int), inner.lambda({}, l => l.ret(field(thisRef(), 'size'))));
          });
        });
      })
      .build();

    const result = convertClosures(method);
    assert.deepEqual(result.environments, []);
    assert.equal(result.methods[0].isStatic, false);
    assertSameCode(stringifyConversionResult(result), `
      body {
        {
          {
            Func<int> f = new Func<int>(this.Run_lambda);
          }
        }
      }

      int Run_lambda() {
        return this.size;
      }
    `);
  });

  test('Receiver is hoisted with the locals it is captured alongside', () => {
    const method = new MethodBuilder('Run', { isStatic: false })
      .body(b => {
        const x = b.local('x', int, lit(3));
        b.local('f', func(int), b.lambda({}, l => l.ret(bin('+', field(thisRef(), 'size'), ref(x)))));
      })
      .build();

    assertSameCode(lower(method), `
      body {
        Run_Env0 $env0 = new Run_Env0();
        $env0.$this = this;
        $env0.x = 3;
        Func<int> f = new Func<int>($env0.Run_lambda);
      }

      class Run_Env0 {
        Widget $this;
        int x;
        int Run_lambda() {
          return this.$this.size + this.x;
        }
      }
    `);
  });

  test('Local function reading the receiver through a struct environment', () => {
    const method = new MethodBuilder('Run', { isStatic: false, returnType: int })
      .body(b => {
        const x = b.local('x', int, lit(3));
        const sum = b.localFunction({ name: 'sum' }, f => f.ret(bin('+', field(thisRef(), 'size'), ref(x))));
        b.ret(callLocal(sum));
      })
      .build();

    assertSameCode(lower(method), `
      body {
        Run_Env0 $env0 = default(Run_Env0);
        $env0.$this = this;
        $env0.x = 3;
        return Run_sum(ref $env0);
      }

      struct Run_Env0 {
        Widget $this;
        int x;
      }

      static int Run_sum(ref Run_Env0 $env0) {
        return $env0.$this.size + $env0.x;
      }
    `);
  });

  test('Local function reading only `this` becomes an instance method', () => {
    const method = new MethodBuilder('Run', { isStatic: false, returnType: int })
      .body(b => {
        const size = b.localFunction({ name: 'size' }, f => f.ret(field(thisRef(), 'size')));
        b.ret(callLocal(size));
      })
      .build();

    assertSameCode(lower(method), `
      body {
        return this.Run_size();
      }

      int Run_size() {
        return this.size;
      }
    `);
  });

  test('Receiver in a scope that owns a class environment', () => {
    const method = new MethodBuilder('Run', { isStatic: false, returnType: int })
      .body(b => {
        const x = b.local('x', int, lit(1));
        b.local('f', func(int), b.lambda({}, l => l.ret(ref(x))));
        b.ret(field(thisRef(), 'size'));
      })
      .build();

    assertSameCode(lower(method), `
      body {
        Run_Env0 $env0 = new Run_Env0();
        $env0.x = 1;
        Func<int> f = new Func<int>($env0.Run_lambda);
        return this.size;
      }

      class Run_Env0 {
        int x;
        int Run_lambda() {
          return this.x;
        }
      }
    `);
  });

  test('Receiver in a lambda body that owns a class environment', () => {
    const method = new MethodBuilder('Run', { isStatic: false })
      .body(b => {
        b.local('g', func(int), b.lambda({ name: 'outer' }, outer => {
          const y = outer.local('y', int, lit(2));
          outer.local('h', func(int), outer.lambda({ name: 'inner' }, inner => inner.ret(ref(y))));
          outer.ret(field(thisRef(), 'size'));
        }));
      })
      .build();

    assertSameCode(lower(method), `
      body {
        Func<int> g = new Func<int>(this.Run_outer);
      }

      class Run_Env0 {
        int y;
        int Run_inner() {
          return this.y;
        }
      }

      int Run_outer() {
        Run_Env0 $env0 = new Run_Env0();
        $env0.y = 2;
        Func<int> h = new Func<int>($env0.Run_inner);
        return this.size;
      }
    `);
  });

  test('Instance method on the enclosing type called from a scope that owns a class environment', () => {
    const method = new MethodBuilder('Run', { isStatic: false, returnType: int })
      .body(b => {
        const size = b.localFunction({ name: 'size' }, f => f.ret(field(thisRef(), 'size')));
        b.block(inner => {
          const x = inner.local('x', int, lit(1));
          inner.local('f', func(int), inner.lambda({}, l => l.ret(ref(x))));
          inner.ret(callLocal(size));
        });
      })
      .build();

    assertSameCode(lower(method), `
      body {
        {
          Run_Env0 $env0 = new Run_Env0();
          $env0.x = 1;
          Func<int> f = new Func<int>($env0.Run_lambda);
          return this.Run_size();
        }
      }

      class Run_Env0 {
        int x;
        int Run_lambda() {
          return this.x;
        }
      }

      int Run_size() {
        return this.size;
      }
    `);
  });

  test('Class environment chains to the receiver once the receiver-only environment is removed', () => {
    const method = new MethodBuilder('Run', { isStatic: false })
      .body(b => {
        b.block(inner => {
          const x = inner.local('x', int, lit(1));
          inner.local('f', func(int), inner.lambda({}, l => l.ret(bin('+', ref(x), field(thisRef(), 'size')))));
        });
      })
      .build();

    assertSameCode(lower(method), `
      body {
        {
          Run_Env0 $env0 = new Run_Env0();
          $env0.$parent = this;
          $env0.x = 1;
          Func<int> f = new Func<int>($env0.Run_lambda);
        }
      }

      class Run_Env0 {
        int x;
        Widget $parent;
        int Run_lambda() {
          return this.x + this.$parent.size;
        }
      }
    `);
  });

  test('Lambda calling a local function shares its class environment', () => {
    const method = new MethodBuilder('Run')
      .body(b => {
        const total = b.local('total', int, lit(0));
        const add = b.localFunction({ name: 'add', parameters: [['v', int]], returnType: voidType }, (f, [v]) => {
          f.expr(assign(ref(total), bin('+', ref(total), ref(v))));
        });
        b.local('a', action(int), b.lambda({
          parameters: [['w', int]],
          returnType: voidType,
          delegateType: action(int),
        }, (l, [w]) => l.expr(callLocal(add, ref(w)))));
      })
      .build();

    assertSameCode(lower(method), `
      body {
        Run_Env0 $env0 = new Run_Env0();
        $env0.total = 0;
        Action<int> a = new Action<int>($env0.Run_lambda);
      }

      class Run_Env0 {
        int total;
        void Run_add(int v) {
          this.total = this.total + v;
        }
        void Run_lambda(int w) {
          this.Run_add(w);
        }
      }
    `);
  });

  test('Local function converted to a delegate forces a class environment', () => {
    const method = new MethodBuilder('Run')
      .body(b => {
        const n = b.local('n', int, lit(5));
        const get = b.localFunction({ name: 'get', isConvertedToDelegate: true }, f => f.ret(ref(n)));
        b.local('d', func(int), convert(get, func(int)));
        b.expr(callLocal(get));
      })
      .build();

    assertSameCode(lower(method), `
      body {
        Run_Env0 $env0 = new Run_Env0();
        $env0.n = 5;
        Func<int> d = new Func<int>($env0.Run_get);
        $env0.Run_get();
      }

      class Run_Env0 {
        int n;
        int Run_get() {
          return this.n;
        }
      }
    `);
  });

  test('Async local function forces a class environment', () => {
    const method = new MethodBuilder('Run')
      .body(b => {
        const n = b.local('n', int, lit(1));
        const load = b.localFunction({ name: 'load', isAsync: true, returnType: B.namedType('Task') }, f => {
          f.expr(call('Log', [ref(n)]));
        });
        b.expr(callLocal(load));
      })
      .build();

    const result = convertClosures(method);
    assert.equal(result.environments[0].kind, 'class');
    assert.equal(result.methods[0].isAsync, true);
    assertSameCode(stringifyConversionResult(result), `
      body {
        Run_Env0 $env0 = new Run_Env0();
        $env0.n = 1;
        $env0.Run_load();
      }

      class Run_Env0 {
        int n;
        async Task Run_load() {
          Log(this.n);
        }
      }
    `);
  });

  test('Variable captured inside a loop body gets a fresh environment per iteration', () => {
    const method = new MethodBuilder('Run')
      .body(b => {
        const i = b.local('i', int, lit(0));
        b.while(bin('<', ref(i), lit(3)), body => {
          const j = body.local('j', int, ref(i));
          body.expr(call('register', [body.lambda({}, l => l.ret(ref(j)))]));
          body.expr(assign(ref(i), bin('+', ref(i), lit(1))));
        });
      })
      .build();

    assertSameCode(lower(method), `
      body {
        int i = 0;
        while (i < 3) {
          Run_Env0 $env0 = new Run_Env0();
          $env0.j = i;
          register(new Func<int>($env0.Run_lambda));
          i = i + 1;
        }
      }

      class Run_Env0 {
        int j;
        int Run_lambda() {
          return this.j;
        }
      }
    `);
  });

  test('Environment type parameters do not shadow the enclosing type', () => {
    const T = B.typeParameter('T');
    const m = new MethodBuilder('Run', {
      enclosingType: 'Box',
      enclosingTypeParameters: ['T'],
      typeParameters: ['T'],
      returnType: func(T),
    });
    const value = m.parameter('value', T);
    const method = m
      .body(b => {
        b.ret(b.lambda({ returnType: T, delegateType: func(T) }, l => l.ret(ref(value))));
      })
      .build();

    assertSameCode(lower(method), `
      body {
        Run_Env0<T> $env0 = new Run_Env0<T>();
        $env0.value = value;
        return new Func<T>($env0.Run_lambda);
      }

      class Run_Env0<T1> {
        T1 value;
        T1 Run_lambda() {
          return this.value;
        }
      }
    `);
  });

  test('Generic closure on the enclosing type is instantiated with the method type parameters', () => {
    const U = B.typeParameter('U');
    const method = new MethodBuilder('Run', { typeParameters: ['U'] })
      .body(b => {
        b.local('f', func(U), b.lambda({ returnType: U, delegateType: func(U) }, l => l.ret(lit(null))));
      })
      .build();

    assertSameCode(lower(method), `
      body {
        Func<U> f = new Func<U>(Run_lambda<U>);
      }

      static U Run_lambda<U>() {
        return null;
      }
    `);
  });

  test('Generated names avoid collisions', () => {
    const method = new MethodBuilder('Run')
      .body(b => {
        b.local('f', func(int), b.lambda({}, l => l.ret(lit(1))));
        b.local('g', func(int), b.lambda({}, l => l.ret(lit(2))));
      })
      .build();

    const result = convertClosures(method);
    assert.deepEqual(result.methods.map(m => m.name), ['Run_lambda', 'Run_lambda1']);
  });

  test('Input method is not modified', () => {
    const method = new MethodBuilder('Run')
      .body(b => {
        const x = b.local('x', int, lit(1));
        b.local('f', func(int), b.lambda({}, l => l.ret(ref(x))));
      })
      .build();
    const before = JSON.stringify(method);
    convertClosures(method);
    assert.equal(JSON.stringify(method), before);
  });
});
