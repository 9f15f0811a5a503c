/**
 * ScopeSelector Unit Tests
 *
 * Restricting header text to the body of one class.
 */

import { describe, it, expect } from 'vitest';
import { isClassOpeningLine, selectScope } from './ScopeSelector.js';

describe('isClassOpeningLine', () => {
  it('should accept a class header', () => {
    expect(isClassOpeningLine('class Widget {', 'Widget')).toBe(true);
    expect(isClassOpeningLine('class Widget', 'Widget')).toBe(true);
  });

  it('should accept an export macro between class and name', () => {
    expect(isClassOpeningLine('class API_EXPORT Widget : public Base {', 'Widget')).toBe(true);
  });

  it('should reject a longer name with the same prefix', () => {
    expect(isClassOpeningLine('class WidgetFactory {', 'Widget')).toBe(false);
  });

  it('should reject a class that only derives from the target', () => {
    expect(isClassOpeningLine('class Button : public Widget {', 'Widget')).toBe(false);
  });

  it('should reject a forward declaration', () => {
    expect(isClassOpeningLine('class Widget;', 'Widget')).toBe(false);
  });

  it('should reject a template parameter named like the target', () => {
    expect(isClassOpeningLine('template <class Widget>', 'Widget')).toBe(false);
    expect(isClassOpeningLine('template <class Widget, class Alloc>', 'Widget')).toBe(false);
    expect(isClassOpeningLine('template <class Widget = int>', 'Widget')).toBe(false);
  });

  it('should reject an elaborated type in a parameter list', () => {
    expect(isClassOpeningLine('void attach(class Widget* w);', 'Widget')).toBe(false);
    expect(isClassOpeningLine('void attach(class Widget& w);', 'Widget')).toBe(false);
    expect(isClassOpeningLine('void attach(class Widget);', 'Widget')).toBe(false);
  });

  it('should accept a header after a template parameter list on the same line', () => {
    expect(isClassOpeningLine('template <class T> class Widget {', 'Widget')).toBe(true);
  });

  it('should reject lines without the class keyword', () => {
    expect(isClassOpeningLine('Widget* make_widget();', 'Widget')).toBe(false);
  });
});

describe('selectScope', () => {
  it('should return the text unchanged without a target class', () => {
    const text = 'virtual int f();\nvirtual int g();';
    expect(selectScope(text)).toBe(text);
  });

  it('should keep the body of a class whose brace is on the next line', () => {
    const text = [
      '',
      'void do_not_mock() override;',
      '',
      'class TestClass',
      '{',
      '    void do_mock() override;',
      '};',
      ''
    ].join('\n');

    expect(selectScope(text, 'TestClass')).toBe('{\n    void do_mock() override;');
  });

  it('should keep the body of a class declared on a single line', () => {
    const text = 'void A();\nclass T { void B() override; };';

    expect(selectScope(text, 'T')).toBe(' void B() override; ');
  });

  it('should return an empty string when the class is missing', () => {
    expect(selectScope('class Other {\n  virtual void f();\n};', 'Missing')).toBe('');
  });

  it('should keep nested classes inside the target', () => {
    const text = [
      'class Outer {',
      '  class Inner {',
      '    virtual void inner();',
      '  };',
      '  virtual void outer();',
      '};',
      'virtual void after();'
    ].join('\n');

    expect(selectScope(text, 'Outer')).toBe(
      '\n  class Inner {\n    virtual void inner();\n  };\n  virtual void outer();'
    );
  });

  it('should stop at the end of a nested target class', () => {
    const text = [
      'class Outer {',
      '  class Inner {',
      '    virtual void inner();',
      '  };',
      '  virtual void outer();',
      '};'
    ].join('\n');

    expect(selectScope(text, 'Inner')).toBe('\n    virtual void inner();');
  });

  it('should take the class brace, not an enclosing one, on the opening line', () => {
    const text = [
      'namespace ns { class T {',
      '  virtual void inT();',
      '};',
      'class U {',
      '  virtual void inU();',
      '};',
      '}'
    ].join('\n');

    expect(selectScope(text, 'T')).toBe('\n  virtual void inT();');
  });

  it('should find the class brace on the next line inside a namespace', () => {
    const text = 'namespace ns { class T\n{\n  virtual void inT();\n};\n}';

    expect(selectScope(text, 'T')).toBe('{\n  virtual void inT();');
  });

  it('should skip a template parameter named like the target', () => {
    const text = [
      'template <class T>',
      'class Holder {',
      '  virtual void hold();',
      '};',
      'class T {',
      '  virtual void own();',
      '};'
    ].join('\n');

    expect(selectScope(text, 'T')).toBe('\n  virtual void own();');
  });

  it('should skip a forward declaration before the definition', () => {
    const text = 'class T;\nvoid x();\nclass T {\n  virtual int f();\n};';

    expect(selectScope(text, 'T')).toBe('\n  virtual int f();');
  });

  it('should not confuse classes sharing a name prefix', () => {
    const text = [
      'class Tester {',
      '  virtual int a();',
      '};',
      'class Test {',
      '  virtual int b();',
      '};'
    ].join('\n');

    expect(selectScope(text, 'Test')).toBe('\n  virtual int b();');
  });
});
