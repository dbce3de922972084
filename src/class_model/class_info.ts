import { Equal } from 'effect';
import { IllegalStateError, TargetKindError } from './errors';
import { DotNames } from './dot_names';
import { Modifiers } from './modifiers';
import { resolveWithRepeatable } from './annotation_resolver';
import { AnnotationTargetKind } from './annotation_target';
import type { AnnotationTargetOps } from './annotation_target';
import type { AnnotationInstance } from './annotation_instance';
import type { FieldInfo } from './field_info';
import type { MethodInfo } from './method_info';
import type { MethodParameterInfo } from './method_parameter_info';
import type { RecordComponentInfo } from './record_component_info';
import type { Type } from './type';
import type { TypeCatalog } from './type_catalog';
import type { TypeTarget } from './type_target';

/**
 * Declarations owned by a class. Filled in by `ClassInfoBuilder` right after the class is
 * allocated, then frozen.
 */
export interface ClassMembers {
    annotations: readonly AnnotationInstance[];
    fields: readonly FieldInfo[];
    methods: readonly MethodInfo[];
    recordComponents: readonly RecordComponentInfo[];
}

export class ClassInfo implements AnnotationTargetOps {
    public static readonly CLASS_PUBLIC = Modifiers.PUBLIC;
    public static readonly CLASS_FINAL = Modifiers.FINAL;
    public static readonly CLASS_SUPER = 0x0020;
    public static readonly CLASS_INTERFACE = Modifiers.INTERFACE;
    public static readonly CLASS_ABSTRACT = Modifiers.ABSTRACT;
    public static readonly CLASS_SYNTHETIC = Modifiers.SYNTHETIC;
    public static readonly CLASS_ANNOTATION = Modifiers.ANNOTATION;
    public static readonly CLASS_ENUM = Modifiers.ENUM;

    private readonly thisClass: string;
    private readonly accessFlags: number;
    private readonly superClass?: string;
    private readonly interfaces: readonly string[];
    private readonly members: ClassMembers;

    public constructor(name: string, flags: number, superName: string | undefined, interfaceNames: readonly string[], members: ClassMembers) {
        this.thisClass = name;
        this.accessFlags = flags;
        this.superClass = superName;
        this.interfaces = interfaceNames;
        this.members = members;
    }

    /** Binary name, e.g. `com.example.Outer$Inner`. */
    public name(): string {
        return this.thisClass;
    }

    public simpleName(): string {
        return DotNames.simpleName(this.thisClass);
    }

    public flags(): number {
        return this.accessFlags;
    }

    public superName(): string | undefined {
        return this.superClass;
    }

    public interfaceNames(): readonly string[] {
        return this.interfaces;
    }

    public kind(): AnnotationTargetKind.CLASS {
        return AnnotationTargetKind.CLASS;
    }

    public isAnnotation(): boolean {
        return Modifiers.isAnnotation(this.accessFlags);
    }

    public isInterface(): boolean {
        return Modifiers.isInterface(this.accessFlags);
    }

    public isEnum(): boolean {
        return Modifiers.isEnum(this.accessFlags) && this.superClass === DotNames.ENUM;
    }

    public isRecord(): boolean {
        return this.superClass === DotNames.RECORD;
    }

    public classAnnotations(): readonly AnnotationInstance[] {
        return this.members.annotations;
    }

    public classAnnotation(name: string): AnnotationInstance | undefined {
        const annotations = this.members.annotations;
        for(let i = 0; i < annotations.length; i++) {
            if(annotations[i].name() === name)
                return annotations[i];
        }
        return undefined;
    }

    public hasClassAnnotation(name: string): boolean {
        return this.classAnnotation(name) !== undefined;
    }

    public classAnnotationsWithRepeatable(name: string, catalog: TypeCatalog): AnnotationInstance[] {
        return resolveWithRepeatable({ annotation: (n: string) => this.classAnnotation(n) }, name, catalog);
    }

    public fields(): readonly FieldInfo[] {
        return this.members.fields;
    }

    public field(name: string): FieldInfo | undefined {
        const fields = this.members.fields;
        for(let i = 0; i < fields.length; i++) {
            if(fields[i].name() === name)
                return fields[i];
        }
        return undefined;
    }

    /**
     * Fields of this class and of every superclass the catalog knows, superclass fields first.
     * The walk stops at the first superclass missing from the catalog.
     *
     * @throws IllegalStateError if the superclass chain loops
     */
    public allFields(catalog: TypeCatalog): FieldInfo[] {
        const chain: ClassInfo[] = [this];
        const visited = new Set<string>([this.thisClass]);
        let superName = this.superClass;
        while(superName) {
            if(visited.has(superName))
                throw new IllegalStateError('Cyclic superclass chain at ' + superName);
            visited.add(superName);
            const parent = catalog.getClassByName(superName);
            if(!parent)
                break;
            chain.unshift(parent);
            superName = parent.superName();
        }
        const ret: FieldInfo[] = [];
        for(let i = 0; i < chain.length; i++)
            ret.push(...chain[i].fields());
        return ret;
    }

    public methods(): readonly MethodInfo[] {
        return this.members.methods;
    }

    public method(name: string, ...parameterTypes: Type[]): MethodInfo | undefined {
        const methods = this.members.methods;
        for(let i = 0; i < methods.length; i++) {
            const method = methods[i];
            if(method.name() !== name)
                continue;
            const types = method.parameterTypes();
            if(types.length !== parameterTypes.length)
                continue;
            let match = true;
            for(let j = 0; j < types.length && match; j++)
                match = Equal.equals(types[j], parameterTypes[j]);
            if(match)
                return method;
        }
        return undefined;
    }

    public firstMethod(name: string): MethodInfo | undefined {
        return this.members.methods.find(method => method.name() === name);
    }

    public recordComponents(): readonly RecordComponentInfo[] {
        return this.members.recordComponents;
    }

    public recordComponent(name: string): RecordComponentInfo | undefined {
        return this.members.recordComponents.find(component => component.name() === name);
    }

    public asClass(): ClassInfo {
        return this;
    }

    public asField(): FieldInfo {
        throw new TargetKindError('Not a field');
    }

    public asMethod(): MethodInfo {
        throw new TargetKindError('Not a method');
    }

    public asMethodParameter(): MethodParameterInfo {
        throw new TargetKindError('Not a method parameter');
    }

    public asType(): TypeTarget {
        throw new TargetKindError('Not a type');
    }

    public asRecordComponent(): RecordComponentInfo {
        throw new TargetKindError('Not a record component');
    }

    public toString(): string {
        return this.thisClass;
    }
}
