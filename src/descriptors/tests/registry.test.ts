import { describe, expect, it } from 'vitest';
import { captureError } from '../../tests/helpers';
import { defineCatalog } from '../../types/registry';
import {
  booleanType,
  enumeration,
  floatingType,
  integerType,
  structured,
  textType
} from '../index';
import { createDescriptorRegistry } from '../registry';

const insets = structured('EdgeInsets', { top: floatingType, bottom: floatingType });

const catalog = defineCatalog({
  View: {
    properties: { hidden: booleanType, alpha: floatingType, layoutMargins: insets }
  },
  Label: {
    extends: 'View',
    properties: {
      text: textType,
      textAlignment: enumeration({ left: 0, center: 1, right: 2 })
    }
  },
  Separator: {
    extends: 'View',
    properties: { alpha: integerType },
    exclude: ['layoutMargins']
  }
});

describe('createDescriptorRegistry', () => {
  it('expands structured properties into dotted sub-properties', () => {
    const registry = createDescriptorRegistry(catalog);

    expect([...registry.descriptorsFor('View').keys()]).toEqual([
      'hidden',
      'alpha',
      'layoutMargins',
      'layoutMargins.top',
      'layoutMargins.bottom'
    ]);
    expect(registry.lookup('View', 'layoutMargins.top')).toBe(floatingType);
  });

  it('inherits the descriptors of the extended type', () => {
    const registry = createDescriptorRegistry(catalog);

    expect([...registry.descriptorsFor('Label').keys()]).toEqual([
      'hidden',
      'alpha',
      'layoutMargins',
      'layoutMargins.top',
      'layoutMargins.bottom',
      'text',
      'textAlignment'
    ]);
  });

  it('lets own properties override and exclusions remove inherited ones', () => {
    const registry = createDescriptorRegistry(catalog);

    expect([...registry.descriptorsFor('Separator').keys()]).toEqual([
      'hidden',
      'alpha'
    ]);
    expect(registry.lookup('Separator', 'alpha')).toBe(integerType);
    expect(registry.lookup('Separator', 'layoutMargins.top')).toBeUndefined();
  });

  it('drops inherited sub-properties when a structured property is redeclared', () => {
    const registry = createDescriptorRegistry(
      defineCatalog({
        View: { properties: { layoutMargins: insets } },
        Panel: {
          extends: 'View',
          properties: {
            layoutMargins: structured('Margins', { leading: floatingType })
          }
        }
      })
    );

    expect([...registry.descriptorsFor('Panel').keys()]).toEqual([
      'layoutMargins',
      'layoutMargins.leading'
    ]);
  });

  it('keeps explicitly declared sub-properties', () => {
    const registry = createDescriptorRegistry(
      defineCatalog({
        View: { properties: { layoutMargins: insets, 'layoutMargins.top': integerType } }
      })
    );

    expect(registry.lookup('View', 'layoutMargins.top')).toBe(integerType);
  });

  it('computes each set once', () => {
    const registry = createDescriptorRegistry(catalog);
    expect(registry.descriptorsFor('Label')).toBe(registry.descriptorsFor('Label'));
  });

  it('hands out sets that cannot be changed', () => {
    const registry = createDescriptorRegistry(catalog);
    const set = registry.descriptorsFor('Label');

    expect(Object.isFrozen(set)).toBe(true);
    expect('set' in set).toBe(false);
    expect('delete' in set).toBe(false);
    expect(new Map(set).get('text')).toBe(registry.lookup('Label', 'text'));
  });

  it('reports declared target types', () => {
    const registry = createDescriptorRegistry(catalog);
    expect(registry.has('Label')).toBe(true);
    expect(registry.has('Button')).toBe(false);
    expect(registry.has('toString')).toBe(false);
  });

  describe('Failures', () => {
    it('fails for unknown properties', () => {
      const registry = createDescriptorRegistry(catalog);
      const error = captureError(() => registry.require('Label', 'font'));

      expect(error.code).toBe('UNKNOWN_PROPERTY');
      expect(error.message).toBe('Label.font: Unknown property "font" for Label');
    });

    it('fails for unknown target types', () => {
      const registry = createDescriptorRegistry(catalog);
      const error = captureError(() => registry.descriptorsFor('Button'));

      expect(error.code).toBe('DESCRIPTOR_REGISTRY');
      expect(error.message).toBe('Unknown target type "Button"');
    });

    it('names the type extending a missing parent', () => {
      const registry = createDescriptorRegistry(
        defineCatalog({ Switch: { extends: 'Control', properties: {} } })
      );

      expect(() => registry.descriptorsFor('Switch')).toThrow(
        'Unknown target type "Control" (extended by "Switch")'
      );
    });

    it('detects inheritance cycles', () => {
      const registry = createDescriptorRegistry(
        defineCatalog({
          A: { extends: 'B', properties: {} },
          B: { extends: 'A', properties: {} }
        })
      );

      expect(() => registry.descriptorsFor('A')).toThrow(
        'Inheritance cycle: A -> B -> A'
      );
    });

    it('rejects exclusions of properties the type does not have', () => {
      const registry = createDescriptorRegistry(
        defineCatalog({
          View: { properties: { hidden: booleanType } },
          Label: { extends: 'View', properties: {}, exclude: ['font'] }
        })
      );

      expect(() => registry.descriptorsFor('Label')).toThrow(
        '"Label" excludes "font", which it does not have'
      );
    });
  });
});
