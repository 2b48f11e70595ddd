import { describe, it } from 'vitest';
import { MissingFieldError, NotIterableError } from '../src/index';
import { expectTemplate } from './helpers/expect-template';

describe('blocks', () => {
  describe('if', () => {
    it('without else', () => {
      const string = 'a{{ if show }}b{{ endif }}c';

      expectTemplate(string).withInput({ show: true }).toRenderTo('abc');
      expectTemplate(string).withInput({ show: false }).toRenderTo('ac');
    });

    it('falsy values skip the block without error', () => {
      const string = '{{ if v }}yes{{ endif }}';

      for (const v of [null, false, '', 0, Number.NaN, []]) {
        expectTemplate(string).withInput({ v }).withMessage(`v = ${String(v)}`).toRenderTo('');
      }
    });

    it('truthy values enter the block', () => {
      const string = '{{ if v }}yes{{ endif }}';

      for (const v of [true, 'a', 1, -1, [0], {}]) {
        expectTemplate(string).withInput({ v }).withMessage(`v = ${String(v)}`).toRenderTo('yes');
      }
    });

    it('missing condition field is an error', () => {
      expectTemplate('{{ if v }}yes{{ endif }}').withInput({}).toThrow(MissingFieldError, "'v'");
    });

    it('nested if/else', () => {
      const string = '{{ if a }}{{ if b }}ab{{ else }}a{{ endif }}{{ else }}-{{ endif }}';

      expectTemplate(string).withInput({ a: true, b: true }).toRenderTo('ab');
      expectTemplate(string).withInput({ a: true, b: false }).toRenderTo('a');
      expectTemplate(string).withInput({ a: false, b: true }).toRenderTo('-');
    });
  });

  describe('conditions', () => {
    it('equality between paths', () => {
      const string = '{{ if a == b }}eq{{ else }}ne{{ endif }}';

      expectTemplate(string).withInput({ a: 1, b: 1 }).toRenderTo('eq');
      expectTemplate(string).withInput({ a: 1, b: 2 }).toRenderTo('ne');
      expectTemplate(string).withInput({ a: [1, 2], b: [1, 2] }).toRenderTo('eq');
      expectTemplate(string).withInput({ a: { x: 1 }, b: { x: 1 } }).toRenderTo('eq');
    });

    it('cross-kind equality is always false', () => {
      const string = '{{ if a == b }}eq{{ else }}ne{{ endif }}';

      expectTemplate(string).withInput({ a: 1, b: '1' }).toRenderTo('ne');
      expectTemplate(string).withInput({ a: 0, b: false }).toRenderTo('ne');
      expectTemplate(string).withInput({ a: null, b: false }).toRenderTo('ne');
      expectTemplate(string).withInput({ a: '', b: [] }).toRenderTo('ne');
    });

    it('comparison with literals', () => {
      expectTemplate('{{ if status == "done" }}✓{{ endif }}')
        .withInput({ status: 'done' })
        .toRenderTo('✓');
      expectTemplate("{{ if status != 'done' }}todo{{ endif }}")
        .withInput({ status: 'open' })
        .toRenderTo('todo');
      expectTemplate('{{ if count == 3 }}three{{ endif }}').withInput({ count: 3 }).toRenderTo('three');
      expectTemplate('{{ if v == null }}none{{ endif }}').withInput({ v: null }).toRenderTo('none');
      expectTemplate('{{ if v == true }}on{{ endif }}').withInput({ v: true }).toRenderTo('on');
    });

    it('negation', () => {
      expectTemplate('{{ if not done }}todo{{ endif }}').withInput({ done: false }).toRenderTo('todo');
      expectTemplate('{{ if !done }}todo{{ endif }}').withInput({ done: true }).toRenderTo('');
      expectTemplate('{{ if not not done }}x{{ endif }}').withInput({ done: true }).toRenderTo('x');
      expectTemplate('{{ if not (a == b) }}diff{{ endif }}')
        .withInput({ a: 1, b: 2 })
        .toRenderTo('diff');
    });

    it('a field named not', () => {
      expectTemplate('{{ if not }}x{{ endif }}').withInput({ not: true }).toRenderTo('x');
    });
  });

  describe('for', () => {
    it('iterates items in order', () => {
      expectTemplate('{{ for u in users }}{{ u.name }} {{ endfor }}')
        .withInput({ users: [{ name: 'a' }, { name: 'b' }, { name: 'c' }] })
        .toRenderTo('a b c ');
    });

    it('index binding', () => {
      expectTemplate('{{ for x, i in items }}{{ i }}:{{ x }} {{ endfor }}')
        .withInput({ items: ['a', 'b'] })
        .toRenderTo('0:a 1:b ');
    });

    it('@index, @first and @last', () => {
      expectTemplate(
        '{{ for x in xs }}{{ if @first }}[{{ endif }}{{ @index }}={{ x }}{{ if @last }}]{{ else }},{{ endif }}{{ endfor }}',
      )
        .withInput({ xs: ['a', 'b', 'c'] })
        .toRenderTo('[0=a,1=b,2=c]');
    });

    it('single item is both first and last', () => {
      expectTemplate('{{ for x in xs }}{{ @first }}/{{ @last }}{{ endfor }}')
        .withInput({ xs: [1] })
        .toRenderTo('true/true');
    });

    it('nested loops', () => {
      expectTemplate('{{ for row in rows }}{{ for c in row }}{{ c }}{{ endfor }};{{ endfor }}')
        .withInput({ rows: [[1, 2], [3], []] })
        .toRenderTo('12;3;;');
    });

    it('@index refers to the innermost loop', () => {
      expectTemplate(
        '{{ for row, r in rows }}{{ for c in row }}{{ r }}.{{ @index }} {{ endfor }}{{ endfor }}',
      )
        .withInput({ rows: [['a', 'b'], ['c']] })
        .toRenderTo('0.0 0.1 1.0 ');
    });

    it('reads outer fields inside the body', () => {
      expectTemplate('{{ for x in xs }}{{ sep }}{{ x }}{{ endfor }}')
        .withInput({ sep: '-', xs: [1, 2] })
        .toRenderTo('-1-2');
    });

    it('binding shadows an outer field only inside the loop', () => {
      expectTemplate('{{ for x in xs }}{{ x }}{{ endfor }}|{{ x }}')
        .withInput({ x: 'outer', xs: ['inner'] })
        .toRenderTo('inner|outer');
    });

    it('empty loop emits nothing and does not leak the binding', () => {
      expectTemplate('{{ for x in xs }}never{{ endfor }}done').withInput({ xs: [] }).toRenderTo('done');
      expectTemplate('{{ for x in xs }}{{ endfor }}{{ x }}')
        .withInput({ xs: [] })
        .toThrow(MissingFieldError, "Missing field 'x'");
      expectTemplate('{{ for x in xs }}{{ endfor }}{{ x }}')
        .withInput({ xs: [1] })
        .toThrow(MissingFieldError, "Missing field 'x'");
    });

    it('rejects non-sequences', () => {
      expectTemplate('{{ for x in name }}{{ endfor }}')
        .withInput({ name: 'abc' })
        .toThrow(NotIterableError, "Expected 'name' to be a sequence but found string");
      expectTemplate('{{ for x in user }}{{ endfor }}')
        .withInput({ user: { a: 1 } })
        .toThrow(NotIterableError, 'found object');
    });

    it('iterates a Set', () => {
      expectTemplate('{{ for x in tags }}{{ x }} {{ endfor }}')
        .withInput({ tags: new Set(['a', 'b']) })
        .toRenderTo('a b ');
    });
  });

  describe('with', () => {
    it('anonymous scope exposes fields and this', () => {
      expectTemplate('{{ with user }}{{ name }} {{ this.age }}{{ endwith }}')
        .withInput({ user: { name: 'Ada', age: 36 } })
        .toRenderTo('Ada 36');
    });

    it('anonymous scope hides outer fields', () => {
      expectTemplate('{{ with user }}{{ title }}{{ endwith }}')
        .withInput({ title: 'Dr', user: { name: 'Ada' } })
        .toThrow(MissingFieldError, "Missing field 'title'");
    });

    it('enclosing loop bindings are hidden by an anonymous scope', () => {
      expectTemplate('{{ for x in xs }}{{ with user }}{{ x }}{{ endwith }}{{ endfor }}')
        .withInput({ xs: [1], user: { name: 'Ada' } })
        .toThrow(MissingFieldError, "Missing field 'x'");
    });

    it('loop bindings inside an anonymous scope resolve', () => {
      expectTemplate('{{ with user }}{{ for t in tags }}{{ t }}{{ name }}{{ endfor }}{{ endwith }}')
        .withInput({ user: { name: '!', tags: ['a'] } })
        .toRenderTo('a!');
    });

    it('named scope', () => {
      expectTemplate('{{ with user.address as addr }}{{ addr.city }}, {{ name }}{{ endwith }}')
        .withInput({ name: 'Ada', user: { address: { city: 'Paris' } } })
        .toRenderTo('Paris, Ada');
    });

    it('named scope does not expose its fields directly', () => {
      expectTemplate('{{ with user as u }}{{ name }}{{ endwith }}')
        .withInput({ user: { name: 'Ada' } })
        .toThrow(MissingFieldError, "Missing field 'name'");
    });

    it('@root reaches the render data from any depth', () => {
      expectTemplate('{{ with user }}{{ for t in tags }}{{ @root.site }}/{{ t }} {{ endfor }}{{ endwith }}')
        .withInput({ site: 'x', user: { tags: ['a', 'b'] } })
        .toRenderTo('x/a x/b ');
    });

    it('scope is popped at endwith', () => {
      expectTemplate('{{ with user }}{{ name }}{{ endwith }}-{{ name }}')
        .withInput({ name: 'root', user: { name: 'inner' } })
        .toRenderTo('inner-root');
    });
  });

  describe('paths', () => {
    it('digit segments index into sequences', () => {
      expectTemplate('{{ items.1.name }}')
        .withInput({ items: [{ name: 'a' }, { name: 'b' }] })
        .toRenderTo('b');
      expectTemplate('{{ grid.0.1 }}').withInput({ grid: [[1, 2]] }).toRenderTo('2');
    });

    it('out of range index is a missing field', () => {
      expectTemplate('{{ items.5 }}')
        .withInput({ items: [1] })
        .toThrow(MissingFieldError, "Missing field 'items.5'");
    });

    it('this is the root value outside of with blocks', () => {
      expectTemplate('{{ for x in xs }}{{ this.label }}{{ endfor }}')
        .withInput({ label: 'L', xs: [1, 2] })
        .toRenderTo('LL');
      expectTemplate('{{ this }}').withInput('plain').toRenderTo('plain');
    });

    it('keyword-like segments are field names', () => {
      expectTemplate('{{ flags.true }} {{ flags.null }}')
        .withInput({ flags: { true: 'yes', null: 'none' } })
        .toRenderTo('yes none');
    });
  });
});
