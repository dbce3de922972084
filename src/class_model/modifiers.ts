export class Modifiers {
    public static readonly PUBLIC = 0x0001;
    public static readonly PRIVATE = 0x0002;
    public static readonly PROTECTED = 0x0004;
    public static readonly STATIC = 0x0008;
    public static readonly FINAL = 0x0010;
    public static readonly SYNCHRONIZED = 0x0020;
    public static readonly VOLATILE = 0x0040;
    public static readonly BRIDGE = 0x0040;
    public static readonly TRANSIENT = 0x0080;
    public static readonly VARARGS = 0x0080;
    public static readonly NATIVE = 0x0100;
    public static readonly INTERFACE = 0x0200;
    public static readonly ABSTRACT = 0x0400;
    public static readonly STRICT = 0x0800;
    public static readonly SYNTHETIC = 0x1000;
    public static readonly ANNOTATION = 0x2000;
    public static readonly ENUM = 0x4000;
    public static readonly MANDATED = 0x8000;

    private static readonly FIELD_MODIFIERS: [number, string][] = [
        [Modifiers.PUBLIC, 'public'],
        [Modifiers.PROTECTED, 'protected'],
        [Modifiers.PRIVATE, 'private'],
        [Modifiers.STATIC, 'static'],
        [Modifiers.FINAL, 'final'],
        [Modifiers.TRANSIENT, 'transient'],
        [Modifiers.VOLATILE, 'volatile']
    ];

    private static readonly METHOD_MODIFIERS: [number, string][] = [
        [Modifiers.PUBLIC, 'public'],
        [Modifiers.PROTECTED, 'protected'],
        [Modifiers.PRIVATE, 'private'],
        [Modifiers.ABSTRACT, 'abstract'],
        [Modifiers.STATIC, 'static'],
        [Modifiers.FINAL, 'final'],
        [Modifiers.SYNCHRONIZED, 'synchronized'],
        [Modifiers.NATIVE, 'native'],
        [Modifiers.STRICT, 'strictfp']
    ];

    public static isPublic(flags: number): boolean {
        return (flags & Modifiers.PUBLIC) !== 0;
    }

    public static isPrivate(flags: number): boolean {
        return (flags & Modifiers.PRIVATE) !== 0;
    }

    public static isProtected(flags: number): boolean {
        return (flags & Modifiers.PROTECTED) !== 0;
    }

    public static isStatic(flags: number): boolean {
        return (flags & Modifiers.STATIC) !== 0;
    }

    public static isFinal(flags: number): boolean {
        return (flags & Modifiers.FINAL) !== 0;
    }

    public static isSynthetic(flags: number): boolean {
        return (flags & Modifiers.SYNTHETIC) !== 0;
    }

    public static isEnum(flags: number): boolean {
        return (flags & Modifiers.ENUM) !== 0;
    }

    public static isAnnotation(flags: number): boolean {
        return (flags & Modifiers.ANNOTATION) !== 0;
    }

    public static isInterface(flags: number): boolean {
        return (flags & Modifiers.INTERFACE) !== 0;
    }

    // VOLATILE/BRIDGE and TRANSIENT/VARARGS share bits, so the table depends on the member kind
    public static fieldModifiersToString(flags: number): string {
        return Modifiers.render(flags, Modifiers.FIELD_MODIFIERS);
    }

    public static methodModifiersToString(flags: number): string {
        return Modifiers.render(flags, Modifiers.METHOD_MODIFIERS);
    }

    private static render(flags: number, table: [number, string][]): string {
        const ret: string[] = [];
        for(let i = 0; i < table.length; i++) {
            if(flags & table[i][0])
                ret.push(table[i][1]);
        }
        return ret.join(' ');
    }
}
