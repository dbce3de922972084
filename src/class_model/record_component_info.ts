import { TargetKindError } from './errors';
import { resolveWithRepeatable } from './annotation_resolver';
import { AnnotationTargetKind } from './annotation_target';
import type { AnnotationTargetOps } from './annotation_target';
import type { AnnotationInstance } from './annotation_instance';
import type { ClassInfo } from './class_info';
import type { FieldInfo } from './field_info';
import type { MethodInfo } from './method_info';
import type { MethodParameterInfo } from './method_parameter_info';
import type { Type } from './type';
import type { TypeCatalog } from './type_catalog';
import type { TypeTarget } from './type_target';

export interface RecordComponentMembers {
    annotations: readonly AnnotationInstance[];
}

export class RecordComponentInfo implements AnnotationTargetOps {
    private readonly clazz: ClassInfo;
    private readonly componentName: string;
    private readonly componentType: Type;
    private readonly members: RecordComponentMembers;

    public constructor(clazz: ClassInfo, name: string, type: Type, members: RecordComponentMembers) {
        this.clazz = clazz;
        this.componentName = name;
        this.componentType = type;
        this.members = members;
    }

    public declaringClass(): ClassInfo {
        return this.clazz;
    }

    public name(): string {
        return this.componentName;
    }

    public type(): Type {
        return this.componentType;
    }

    public kind(): AnnotationTargetKind.RECORD_COMPONENT {
        return AnnotationTargetKind.RECORD_COMPONENT;
    }

    /** The private field backing this component. */
    public field(): FieldInfo | undefined {
        return this.clazz.field(this.componentName);
    }

    /** The accessor method of this component. */
    public accessor(): MethodInfo | undefined {
        return this.clazz.method(this.componentName);
    }

    public annotations(): readonly AnnotationInstance[] {
        return this.members.annotations;
    }

    public annotation(name: string): AnnotationInstance | undefined {
        return this.members.annotations.find(annotation => annotation.name() === name);
    }

    public annotationsWithRepeatable(name: string, catalog: TypeCatalog): AnnotationInstance[] {
        return resolveWithRepeatable(this, name, catalog);
    }

    public asClass(): ClassInfo {
        throw new TargetKindError('Not a class');
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
        return this;
    }

    public toString(): string {
        return this.componentType.toString() + ' ' + this.clazz.name() + '.' + this.componentName;
    }
}
