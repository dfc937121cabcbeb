import { DexAccessFlag, hasFlag } from "./accessflags";
import { JavaClassRaw, JavaClassResolved, JavaFieldT, JavaMethodT } from "./classloader";
import { DexUtils } from "./utils";

type JavaType = string | JavaClassResolved;

/** Renders a Java-like declaration (signatures only, empty bodies). */
export class DexClassDumper {

    static dump(javaClass: JavaClassRaw | JavaClassResolved): string {
        const mod = DexUtils.accessFlagsToJavaModifierString(javaClass.accessFlags, "class");
        const isInterface = hasFlag(javaClass.accessFlags, DexAccessFlag.Interface);
        const isEnum = hasFlag(javaClass.accessFlags, DexAccessFlag.Enum);

        const keyword = isEnum ? "enum" : (isInterface ? "interface" : "class");

        const parts: string[] = [];
        if (mod) parts.push(mod);
        parts.push(keyword);
        parts.push(javaClass.name);

        const interfaces: JavaType[] = javaClass.interfaces;
        const fields: JavaFieldT<JavaType>[] = javaClass.fields;
        const methods: JavaMethodT<JavaType>[] = javaClass.methods;

        const ifaces = interfaces
            .map((i) => this.typeRefToName(i))
            .filter((s) => s.length > 0);

        if (isInterface) {
            if (ifaces.length > 0) {
                parts.push("extends");
                parts.push(ifaces.join(", "));
            }
        } else {
            const superName = this.typeRefToName(javaClass.super);
            if (superName.length > 0 && superName !== "java.lang.Object" && !isEnum) {
                parts.push("extends");
                parts.push(superName);
            }

            if (ifaces.length > 0) {
                parts.push("implements");
                parts.push(ifaces.join(", "));
            }
        }

        const fieldLines = fields.map((f) => `    ${this.dumpField(f)};`);
        const methodLines = methods.map((m) => `    ${this.dumpMethod(m, javaClass.name)}`);
        if (fieldLines.length === 0 && methodLines.length === 0) {
            return `${parts.join(" ")} { }`;
        }

        const sections: string[] = [];
        if (fieldLines.length > 0) sections.push(fieldLines.join("\n"));
        if (methodLines.length > 0) sections.push(methodLines.join("\n\n"));
        return `${parts.join(" ")} {\n${sections.join("\n\n")}\n}`;
    }

    private static dumpField(field: JavaFieldT<JavaType>): string {
        const mod = DexUtils.accessFlagsToJavaModifierString(field.accessFlags, "field");
        const t = this.typeRefToName(field.type);
        return mod ? `${mod} ${t} ${field.name}` : `${t} ${field.name}`;
    }

    private static dumpMethod(method: JavaMethodT<JavaType>, declaringClassName: string): string {
        if (method.name === "<clinit>") {
            return "static { }";
        }

        const params = method.parameterTypes.map((t, i) => `${this.typeRefToName(t)} arg${i}`);
        let mod = DexUtils.accessFlagsToJavaModifierString(method.accessFlags, "method");

        const headParts: string[] = [];
        if (method.name === "<init>") {
            mod = mod.split(" ").filter((m) => m.length > 0 && m !== "static").join(" ");
            if (mod) headParts.push(mod);
            const simpleName = declaringClassName.split(".").pop() ?? declaringClassName;
            headParts.push(`${simpleName}(${params.join(", ")})`);
        } else {
            if (mod) headParts.push(mod);
            headParts.push(this.typeRefToName(method.returnType));
            headParts.push(`${method.name}(${params.join(", ")})`);
        }

        const head = headParts.join(" ");
        return method.hasCode ? `${head} { }` : `${head};`;
    }

    private static typeRefToName(typeRef?: JavaType | null): string {
        if (typeRef === undefined || typeRef === null) {
            return "";
        }

        if (typeof typeRef === "string") {
            return typeRef;
        }

        return typeRef.name;
    }
}
