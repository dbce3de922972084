import { Array as Arr, Equal, Hash, pipe } from 'effect';
import { IllegalArgumentError, TargetKindError } from './errors';

export enum TypeKind {
    PRIMITIVE,
    VOID,
    CLASS,
    ARRAY,
    PARAMETERIZED
}

export type Type = PrimitiveType | VoidType | ClassType | ArrayType | ParameterizedType;

const typesEquivalence = Arr.getEquivalence(Equal.equivalence<Type>());

/**
 * Base of every type descriptor. Narrowing to the wrong variant throws {@link TargetKindError}.
 */
export abstract class TypeDescriptor implements Equal.Equal {
    public abstract readonly kind: TypeKind;

    /** Binary name of the erasure, e.g. `java.util.List` for `java.util.List<String>`. */
    public abstract name(): string;

    public abstract toString(): string;

    public asPrimitiveType(): PrimitiveType {
        throw new TargetKindError('Not a primitive type');
    }

    public asClassType(): ClassType {
        throw new TargetKindError('Not a class type');
    }

    public asArrayType(): ArrayType {
        throw new TargetKindError('Not an array type');
    }

    public asParameterizedType(): ParameterizedType {
        throw new TargetKindError('Not a parameterized type');
    }

    public abstract [Equal.symbol](that: Equal.Equal): boolean;

    public abstract [Hash.symbol](): number;
}

export class PrimitiveType extends TypeDescriptor {
    public readonly kind = TypeKind.PRIMITIVE;
    public readonly primitive: string;
    public readonly descriptor: string;

    public static readonly BOOLEAN = new PrimitiveType('boolean', 'Z');
    public static readonly BYTE = new PrimitiveType('byte', 'B');
    public static readonly CHAR = new PrimitiveType('char', 'C');
    public static readonly SHORT = new PrimitiveType('short', 'S');
    public static readonly INT = new PrimitiveType('int', 'I');
    public static readonly LONG = new PrimitiveType('long', 'J');
    public static readonly FLOAT = new PrimitiveType('float', 'F');
    public static readonly DOUBLE = new PrimitiveType('double', 'D');

    private constructor(primitive: string, descriptor: string) {
        super();
        this.primitive = primitive;
        this.descriptor = descriptor;
    }

    public name(): string {
        return this.primitive;
    }

    public toString(): string {
        return this.primitive;
    }

    public asPrimitiveType(): PrimitiveType {
        return this;
    }

    public [Equal.symbol](that: Equal.Equal): boolean {
        return that instanceof PrimitiveType && that.primitive === this.primitive;
    }

    public [Hash.symbol](): number {
        return Hash.string(this.primitive);
    }
}

export class VoidType extends TypeDescriptor {
    public readonly kind = TypeKind.VOID;

    public static readonly VOID = new VoidType();

    private constructor() {
        super();
    }

    public name(): string {
        return 'void';
    }

    public toString(): string {
        return 'void';
    }

    public [Equal.symbol](that: Equal.Equal): boolean {
        return that instanceof VoidType;
    }

    public [Hash.symbol](): number {
        return Hash.string('void');
    }
}

export class ClassType extends TypeDescriptor {
    public readonly kind = TypeKind.CLASS;
    private readonly binaryName: string;

    public static readonly OBJECT = new ClassType('java.lang.Object');
    public static readonly STRING = new ClassType('java.lang.String');

    private constructor(binaryName: string) {
        super();
        this.binaryName = binaryName;
    }

    public static create(binaryName: string): ClassType {
        return new ClassType(binaryName);
    }

    public name(): string {
        return this.binaryName;
    }

    public toString(): string {
        return this.binaryName.replace(/\$/g, '.');
    }

    public asClassType(): ClassType {
        return this;
    }

    public [Equal.symbol](that: Equal.Equal): boolean {
        return that instanceof ClassType && that.binaryName === this.binaryName;
    }

    public [Hash.symbol](): number {
        return pipe(Hash.string('class'), Hash.combine(Hash.string(this.binaryName)));
    }
}

export class ArrayType extends TypeDescriptor {
    public readonly kind = TypeKind.ARRAY;
    public readonly component: Type;
    public readonly dimensions: number;

    private constructor(component: Type, dimensions: number) {
        super();
        this.component = component;
        this.dimensions = dimensions;
    }

    /** A component that is itself an array is flattened, so `int[]` + 1 becomes `int[][]`. */
    public static create(component: Type, dimensions: number = 1): ArrayType {
        if(dimensions < 1)
            throw new IllegalArgumentError('Array dimensions must be positive: ' + dimensions);
        if(component instanceof ArrayType)
            return new ArrayType(component.component, component.dimensions + dimensions);
        return new ArrayType(component, dimensions);
    }

    public name(): string {
        let prefix = '';
        for(let i = 0; i < this.dimensions; i++)
            prefix += '[';
        const component = this.component;
        switch(component.kind) {
            case TypeKind.PRIMITIVE:
                return prefix + component.descriptor;
            case TypeKind.VOID:
                return prefix + 'V';
            default:
                return prefix + 'L' + component.name() + ';';
        }
    }

    public toString(): string {
        let ret = this.component.toString();
        for(let i = 0; i < this.dimensions; i++)
            ret += '[]';
        return ret;
    }

    public asArrayType(): ArrayType {
        return this;
    }

    public [Equal.symbol](that: Equal.Equal): boolean {
        return that instanceof ArrayType &&
            that.dimensions === this.dimensions &&
            Equal.equals(that.component, this.component);
    }

    public [Hash.symbol](): number {
        return pipe(
            Hash.hash(this.component),
            Hash.combine(Hash.number(this.dimensions))
        );
    }
}

export class ParameterizedType extends TypeDescriptor {
    public readonly kind = TypeKind.PARAMETERIZED;
    private readonly rawName: string;
    public readonly arguments: readonly Type[];
    public readonly owner?: Type;

    private constructor(rawName: string, args: readonly Type[], owner?: Type) {
        super();
        this.rawName = rawName;
        this.arguments = args;
        this.owner = owner;
    }

    public static create(rawName: string, args: readonly Type[], owner?: Type): ParameterizedType {
        return new ParameterizedType(rawName, Object.freeze([...args]), owner);
    }

    public name(): string {
        return this.rawName;
    }

    public toString(): string {
        let ret: string;
        if(this.owner)
            ret = this.owner.toString() + '.' + this.rawName.substring(this.rawName.lastIndexOf('$') + 1);
        else
            ret = this.rawName.replace(/\$/g, '.');
        if(this.arguments.length > 0)
            ret += '<' + this.arguments.map(arg => arg.toString()).join(', ') + '>';
        return ret;
    }

    public asParameterizedType(): ParameterizedType {
        return this;
    }

    public [Equal.symbol](that: Equal.Equal): boolean {
        if(!(that instanceof ParameterizedType))
            return false;
        if(that.rawName !== this.rawName || !typesEquivalence(that.arguments, this.arguments))
            return false;
        if(this.owner && that.owner)
            return Equal.equals(this.owner, that.owner);
        return !this.owner && !that.owner;
    }

    public [Hash.symbol](): number {
        return pipe(
            Hash.string(this.rawName),
            Hash.combine(Hash.array(this.arguments)),
            Hash.combine(Hash.hash(this.owner))
        );
    }
}
