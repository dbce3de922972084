import { IllegalArgumentError } from './errors';
import type { AnnotationInstance } from './annotation_instance';
import type { ClassInfo } from './class_info';

/**
 * Read-only view over the classes known to an index.
 */
export interface TypeCatalog {
    getClassByName(name: string): ClassInfo | undefined;
    getKnownClasses(): readonly ClassInfo[];
    /** Every instance of the annotation type on any class, member or parameter in the catalog. */
    getAnnotations(name: string): AnnotationInstance[];
}

export class MemoryTypeCatalog implements TypeCatalog {
    private readonly classes: ReadonlyMap<string, ClassInfo>;
    private readonly knownClasses: readonly ClassInfo[];

    private constructor(classes: Map<string, ClassInfo>) {
        this.classes = classes;
        this.knownClasses = Object.freeze([...classes.values()]);
    }

    public static of(...classes: ClassInfo[]): MemoryTypeCatalog {
        const map = new Map<string, ClassInfo>();
        for(let i = 0; i < classes.length; i++) {
            const name = classes[i].name();
            if(map.has(name))
                throw new IllegalArgumentError('Duplicate class ' + name);
            map.set(name, classes[i]);
        }
        return new MemoryTypeCatalog(map);
    }

    public getClassByName(name: string): ClassInfo | undefined {
        return this.classes.get(name);
    }

    public getKnownClasses(): readonly ClassInfo[] {
        return this.knownClasses;
    }

    public getAnnotations(name: string): AnnotationInstance[] {
        const ret: AnnotationInstance[] = [];
        const collect = (annotations: readonly AnnotationInstance[]) => {
            for(let i = 0; i < annotations.length; i++) {
                if(annotations[i].name() === name)
                    ret.push(annotations[i]);
            }
        };
        for(const clazz of this.knownClasses) {
            collect(clazz.classAnnotations());
            for(const field of clazz.fields())
                collect(field.annotations());
            for(const method of clazz.methods()) {
                collect(method.annotations());
                for(const parameter of method.parameters())
                    collect(parameter.annotations());
            }
            for(const component of clazz.recordComponents())
                collect(component.annotations());
        }
        return ret;
    }
}
