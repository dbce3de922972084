import { describe, it, expect } from 'vitest';
import {
    ClassInfoBuilder,
    ClassType,
    IllegalArgumentError,
    IllegalStateError,
    MemoryTypeCatalog,
    PrimitiveType
} from '../index';
import { TAG, marker, markerClass, tag, tagClass, tags, tagsClass } from './fixtures';

describe('MemoryTypeCatalog', () => {
    it('finds classes by binary name', () => {
        const catalog = MemoryTypeCatalog.of(tagClass, tagsClass);

        expect(catalog.getClassByName(TAG)).toBe(tagClass);
        expect(catalog.getClassByName('com.example.Missing')).toBeUndefined();
        expect(catalog.getKnownClasses()).toEqual([tagClass, tagsClass]);
    });

    it('rejects two classes with the same name', () => {
        const copy = ClassInfoBuilder.annotationType(TAG).build();

        expect(() => MemoryTypeCatalog.of(tagClass, copy)).toThrow(IllegalArgumentError);
        expect(() => MemoryTypeCatalog.of(tagClass, copy)).toThrow('Duplicate class com.example.Tag');
    });

    it('collects direct annotation occurrences from every declaration', () => {
        const holder = new ClassInfoBuilder('com.example.Holder')
            .addAnnotation(tag('class'))
            .addField({ name: 'f', type: PrimitiveType.INT, flags: 0, annotations: [tag('field'), marker()] })
            .addMethod({
                name: 'run',
                parameterTypes: [ClassType.STRING],
                annotations: [tag('method')],
                parameterAnnotations: [[tag('parameter')]]
            })
            .addRecordComponent({ name: 'c', type: PrimitiveType.INT, annotations: [tag('component')] })
            .build();
        const other = new ClassInfoBuilder('com.example.Other')
            .addField({ name: 'g', type: PrimitiveType.INT, flags: 0, annotations: [tags(tag('contained'))] })
            .build();
        const catalog = MemoryTypeCatalog.of(tagClass, tagsClass, markerClass, holder, other);

        const found = catalog.getAnnotations(TAG);

        expect(found.map(annotation => annotation.value()?.asString()))
            .toEqual(['class', 'field', 'method', 'parameter', 'component']);
        expect(found[0].target()).toBe(holder);
        expect(found[1].target()).toBe(holder.field('f'));
        expect(found[3].target()).toBe(holder.firstMethod('run')?.parameters()[0]);
        expect(catalog.getAnnotations('com.example.Marker')).toHaveLength(1);
        expect(catalog.getAnnotations('com.example.Unknown')).toEqual([]);
    });
});

describe('ClassInfo', () => {
    const base = new ClassInfoBuilder('com.example.Base')
        .addField({ name: 'id', type: PrimitiveType.LONG, flags: 0 })
        .build();
    const derived = new ClassInfoBuilder('com.example.Derived')
        .setSuperName('com.example.Base')
        .addField({ name: 'name', type: ClassType.STRING, flags: 0 })
        .addMethod({ name: 'rename', parameterTypes: [ClassType.STRING] })
        .addMethod({ name: 'rename', parameterTypes: [ClassType.STRING, PrimitiveType.BOOLEAN] })
        .build();

    it('walks superclass fields known to the catalog', () => {
        const catalog = MemoryTypeCatalog.of(base, derived);

        expect(derived.allFields(catalog).map(field => field.name())).toEqual(['id', 'name']);
        expect(derived.allFields(MemoryTypeCatalog.of()).map(field => field.name())).toEqual(['name']);
    });

    it('fails on a class that extends itself', () => {
        const self = new ClassInfoBuilder('com.example.A').setSuperName('com.example.A').build();

        expect(() => self.allFields(MemoryTypeCatalog.of(self))).toThrow(IllegalStateError);
        expect(() => self.allFields(MemoryTypeCatalog.of(self))).toThrow('Cyclic superclass chain at com.example.A');
    });

    it('fails on a longer superclass cycle', () => {
        const a = new ClassInfoBuilder('com.example.A').setSuperName('com.example.B').build();
        const b = new ClassInfoBuilder('com.example.B').setSuperName('com.example.A').build();

        expect(() => a.allFields(MemoryTypeCatalog.of(a, b))).toThrow('Cyclic superclass chain at com.example.A');
    });

    it('looks up methods by name and parameter types', () => {
        expect(derived.method('rename', ClassType.STRING)?.parameterTypes()).toHaveLength(1);
        expect(derived.method('rename', ClassType.STRING, PrimitiveType.BOOLEAN)?.parameterTypes()).toHaveLength(2);
        expect(derived.method('rename')).toBeUndefined();
        expect(derived.method('rename', ClassType.create('java.lang.String'))).toBe(derived.firstMethod('rename'));
    });

    it('tells annotation types apart from classes', () => {
        expect(tagClass.isAnnotation()).toBe(true);
        expect(tagClass.isInterface()).toBe(true);
        expect(tagClass.interfaceNames()).toEqual(['java.lang.annotation.Annotation']);
        expect(derived.isAnnotation()).toBe(false);
        expect(derived.superName()).toBe('com.example.Base');
        expect(base.superName()).toBe('java.lang.Object');
    });

    it('reports simple names and class annotations', () => {
        const inner = new ClassInfoBuilder('com.example.Outer$Inner').addAnnotation(marker()).build();

        expect(inner.simpleName()).toBe('Inner');
        expect(tagClass.simpleName()).toBe('Tag');
        expect(inner.hasClassAnnotation('com.example.Marker')).toBe(true);
        expect(inner.hasClassAnnotation(TAG)).toBe(false);
        expect(tagClass.hasClassAnnotation('java.lang.annotation.Repeatable')).toBe(true);
    });
});
