import { AccessFlagKind, DexAccessFlag, hasFlag } from "./accessflags";

const PRIMITIVES: Record<string, string> = {
    V: "void",
    Z: "boolean",
    B: "byte",
    S: "short",
    C: "char",
    I: "int",
    J: "long",
    F: "float",
    D: "double",
};

export namespace DexUtils {
    export function dotToDescriptor(str: string): string {
        if (str.length === 0) {
            throw new Error("str is empty");
        }

        const wrapElSemi = str[0] !== "[";
        const replaced = str.replace(/\./g, "/");
        return wrapElSemi ? `L${replaced};` : replaced;
    }

    export function descriptorToDot(str: string): string {
        let s = str;
        if (s.length >= 2 && s[0] === "L" && s[s.length - 1] === ";") {
            s = s.substring(1, s.length - 1);
        }

        return s.replace(/\//g, ".");
    }

    /**
     * `I` -> `int`, `[Ljava/lang/String;` -> `java.lang.String[]`.
     * Unrecognised descriptors are returned unchanged.
     */
    export function descriptorToJavaType(descriptor: string): string {
        let dims = 0;
        while (descriptor[dims] === "[") dims++;

        const element = descriptor.substring(dims);
        let name: string;
        if (element.length === 1 && PRIMITIVES[element] !== undefined) {
            name = PRIMITIVES[element];
        } else if (element.length >= 2 && element[0] === "L" && element[element.length - 1] === ";") {
            name = descriptorToDot(element);
        } else {
            return descriptor;
        }
        return name + "[]".repeat(dims);
    }

    /** `(ILjava/lang/String;)V` style descriptor for a prototype. */
    export function methodDescriptor(returnType: string, parameterTypes: string[]): string {
        return `(${parameterTypes.join("")})${returnType}`;
    }

    export function accessFlagsToJavaModifierString(flags: number, kind: AccessFlagKind): string {
        const mods: string[] = [];

        if (hasFlag(flags, DexAccessFlag.Public)) mods.push("public");
        if (hasFlag(flags, DexAccessFlag.Protected)) mods.push("protected");
        if (hasFlag(flags, DexAccessFlag.Private)) mods.push("private");

        switch (kind) {
            case "class":
                if (hasFlag(flags, DexAccessFlag.Abstract) && !hasFlag(flags, DexAccessFlag.Interface)) mods.push("abstract");
                if (hasFlag(flags, DexAccessFlag.Static)) mods.push("static");
                if (hasFlag(flags, DexAccessFlag.Final) && !hasFlag(flags, DexAccessFlag.Enum)) mods.push("final");
                break;
            case "field":
                if (hasFlag(flags, DexAccessFlag.Static)) mods.push("static");
                if (hasFlag(flags, DexAccessFlag.Final)) mods.push("final");
                if (hasFlag(flags, DexAccessFlag.Transient)) mods.push("transient");
                if (hasFlag(flags, DexAccessFlag.Volatile)) mods.push("volatile");
                break;
            case "method":
                if (hasFlag(flags, DexAccessFlag.Abstract)) mods.push("abstract");
                if (hasFlag(flags, DexAccessFlag.Static)) mods.push("static");
                if (hasFlag(flags, DexAccessFlag.Final)) mods.push("final");
                if (hasFlag(flags, DexAccessFlag.Synchronized) || hasFlag(flags, DexAccessFlag.DeclaredSynchronized)) {
                    mods.push("synchronized");
                }
                if (hasFlag(flags, DexAccessFlag.Native)) mods.push("native");
                if (hasFlag(flags, DexAccessFlag.Strict)) mods.push("strictfp");
                break;
        }

        return mods.join(" ");
    }
}
