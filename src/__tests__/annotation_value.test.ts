import { describe, it, expect } from 'vitest';
import { Equal, Hash } from 'effect';
import {
    AnnotationInstance,
    AnnotationValue,
    AnnotationValueKindError,
    CatalogEntryMissingError,
    ClassType,
    MemoryTypeCatalog,
    PrimitiveType
} from '../index';
import { TAG, tag, tagClass } from './fixtures';

describe('AnnotationValue', () => {
    it('renders source-like member bindings', () => {
        expect(AnnotationValue.createEnumValue('level', 'com.example.Level', 'HIGH').toString()).toBe('level = Level.HIGH');
        expect(AnnotationValue.createLongValue('big', 5n).toString()).toBe('big = 5L');
        expect(AnnotationValue.createFloatValue('ratio', 1.5).toString()).toBe('ratio = 1.5f');
        expect(AnnotationValue.createCharacterValue('sep', ',').toString()).toBe('sep = \',\'');
        expect(AnnotationValue.createArrayValue('types', [
            AnnotationValue.createClassValue('', ClassType.STRING),
            AnnotationValue.createClassValue('', PrimitiveType.INT)
        ]).toString()).toBe('types = {java.lang.String.class, int.class}');
    });

    it('widens between numeric kinds', () => {
        expect(AnnotationValue.createLongValue('big', 5n).asInt()).toBe(5);
        expect(AnnotationValue.createIntegerValue('small', 7).asLong()).toBe(7n);
        expect(AnnotationValue.createDoubleValue('ratio', 2.75).asInt()).toBe(2);
        expect(AnnotationValue.createShortValue('s', 3).asDouble()).toBe(3);
    });

    it('saturates out-of-range and non-finite numbers like a JVM cast', () => {
        const nan = AnnotationValue.createDoubleValue('d', NaN);
        const huge = AnnotationValue.createDoubleValue('d', 1e20);

        expect(nan.asInt()).toBe(0);
        expect(nan.asLong()).toBe(0n);
        expect(AnnotationValue.createFloatValue('f', NaN).asLong()).toBe(0n);
        expect(AnnotationValue.createDoubleValue('d', Infinity).asLong()).toBe(9223372036854775807n);
        expect(AnnotationValue.createDoubleValue('d', -Infinity).asLong()).toBe(-9223372036854775808n);
        expect(AnnotationValue.createDoubleValue('d', -Infinity).asInt()).toBe(-2147483648);
        expect(huge.asInt()).toBe(2147483647);
        expect(huge.asLong()).toBe(9223372036854775807n);
        expect(AnnotationValue.createDoubleValue('d', -1.5).asInt()).toBe(-1);
    });

    it('reads characters and enum constants', () => {
        const level = AnnotationValue.createEnumValue('level', 'com.example.Level', 'HIGH');

        expect(AnnotationValue.createCharacterValue('sep', ',').asChar()).toBe(',');
        expect(level.asEnum()).toBe('HIGH');
        expect(level.asEnumType()).toBe('com.example.Level');
        expect(() => level.asChar()).toThrow('Not a character');
        expect(() => AnnotationValue.createStringValue('v', 'x').asEnumType()).toThrow('Not an enum');
    });

    it('refuses to narrow to another kind', () => {
        const value = AnnotationValue.createStringValue('value', 'x');

        expect(() => value.asInt()).toThrow(AnnotationValueKindError);
        expect(() => value.asInt()).toThrow('Not a number');
        expect(() => value.asClass()).toThrow('Not a class');
        expect(() => value.asNested()).toThrow('Not a nested annotation');
        expect(() => value.asNestedArray()).toThrow('Not a nested annotation array');
        expect(() => AnnotationValue.createBooleanValue('flag', true).asString()).toThrow('Not a string');
    });

    it('narrows an empty array to every element kind', () => {
        const empty = AnnotationValue.createArrayValue('value', []);

        expect(empty.asNestedArray()).toEqual([]);
        expect(empty.asStringArray()).toEqual([]);
        expect(empty.asClassArray()).toEqual([]);
        expect(empty.asEnumArray()).toEqual([]);
    });

    it('narrows typed arrays', () => {
        const names = AnnotationValue.createArrayValue('value', [
            AnnotationValue.createStringValue('', 'a'),
            AnnotationValue.createStringValue('', 'b')
        ]);

        expect(names.asStringArray()).toEqual(['a', 'b']);
        expect(() => names.asClassArray()).toThrow('Not a class array');
        expect(names.asArray()).toHaveLength(2);
    });

    it('compares by name, kind and value', () => {
        const a = AnnotationValue.createStringValue('value', 'x');

        expect(Equal.equals(a, AnnotationValue.createStringValue('value', 'x'))).toBe(true);
        expect(Hash.hash(a)).toBe(Hash.hash(AnnotationValue.createStringValue('value', 'x')));
        expect(Equal.equals(a, AnnotationValue.createStringValue('other', 'x'))).toBe(false);
        expect(Equal.equals(AnnotationValue.createIntegerValue('n', 1), AnnotationValue.createLongValue('n', 1n))).toBe(false);
        expect(Equal.equals(
            AnnotationValue.createClassValue('value', ClassType.create('java.lang.String')),
            AnnotationValue.createClassValue('value', ClassType.STRING)
        )).toBe(true);
    });
});

describe('AnnotationInstance', () => {
    it('renders the type name and members', () => {
        const instance = AnnotationInstance.create(TAG, [
            AnnotationValue.createStringValue('value', 'x'),
            AnnotationValue.createIntegerValue('priority', 3)
        ]);

        expect(instance.toString()).toBe('@com.example.Tag(value = "x", priority = 3)');
        expect(AnnotationInstance.create('com.example.Marker').toString()).toBe('@com.example.Marker');
    });

    it('looks up members, defaulting to value', () => {
        const instance = AnnotationInstance.create(TAG, [
            AnnotationValue.createStringValue('value', 'x'),
            AnnotationValue.createIntegerValue('priority', 3)
        ]);

        expect(instance.value()?.asString()).toBe('x');
        expect(instance.value('priority')?.asInt()).toBe(3);
        expect(instance.value('missing')).toBeUndefined();
        expect(instance.values().map(value => value.name)).toEqual(['value', 'priority']);
    });

    it('ignores the target in equality', () => {
        const nested = tag('x');
        const retargeted = nested.withTarget(tagClass);

        expect(retargeted.target()).toBe(tagClass);
        expect(nested.target()).toBeUndefined();
        expect(Equal.equals(nested, retargeted)).toBe(true);
        expect(Equal.equals(nested, tag('y'))).toBe(false);
    });

    it('falls back to the default declared on the annotation type', () => {
        const catalog = MemoryTypeCatalog.of(tagClass);
        const instance = tag('x');

        expect(instance.valueWithDefault(catalog)?.asString()).toBe('x');
        expect(instance.valueWithDefault(catalog, 'priority')?.asInt()).toBe(5);
        expect(instance.valueWithDefault(catalog, 'missing')).toBeUndefined();
    });

    it('needs the annotation type in the catalog to find defaults', () => {
        const catalog = MemoryTypeCatalog.of();

        expect(() => tag('x').valueWithDefault(catalog, 'priority')).toThrow(CatalogEntryMissingError);
    });
});
