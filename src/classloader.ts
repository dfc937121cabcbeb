import { DexFile } from "./DexFile";
import { AnnotationItem, AnnotationsDirectory } from "./annotations";
import { EncodedField, EncodedMethod } from "./classdata";
import { EncodedValue } from "./encodedvalue";
import { DexUtils } from "./utils";

export interface JavaMethodT<TType> {
    accessFlags: number;
    name: string;
    /** Short-form prototype, e.g. `VIL`. */
    shorty: string;
    returnType: TType;
    parameterTypes: TType[];
    /** False for abstract and native methods. */
    hasCode: boolean;
    annotations: AnnotationItem[];
    /** One set per parameter; empty when no parameter is annotated. */
    parameterAnnotations: AnnotationItem[][];
}

export interface JavaFieldT<TType> {
    accessFlags: number;
    name: string;
    type: TType;
    /** Static fields only; fields past the end of static_values have none. */
    initialValue?: EncodedValue;
    annotations: AnnotationItem[];
}

export interface JavaClassT<TType> {
    /** True for classes referenced by this dex but defined elsewhere. */
    stub: boolean;
    accessFlags: number;
    /** Dotted name, e.g. `java.lang.String`. */
    name: string;
    super?: TType | null;
    interfaces: TType[];
    fields: JavaFieldT<TType>[];
    methods: JavaMethodT<TType>[];
    annotations: AnnotationItem[];
}

export type JavaClassRaw = JavaClassT<string>;

export type JavaMethodRaw = JavaMethodT<string>;

export type JavaFieldRaw = JavaFieldT<string>;

export type JavaClassResolved = JavaClassT<JavaClassResolved>;

export type JavaMethodResolved = JavaMethodT<JavaClassResolved>;

export type JavaFieldResolved = JavaFieldT<JavaClassResolved>;

export class DexClassLoader {

    private readonly dexFile: DexFile;

    private readonly rawClassCache = new Map<string, JavaClassRaw | null>();

    private readonly resolvedClassCache = new Map<string, JavaClassResolved>();

    private readonly stubCache = new Map<string, JavaClassResolved>();

    constructor(dexFile: DexFile) {
        this.dexFile = dexFile;
    }

    /**
     * Looks a class up by dotted name (`java.lang.String`) or descriptor
     * (`Ljava/lang/String;`). Returns null when the dex does not define it;
     * a class that is defined but malformed throws its `DexError`.
     */
    findClass(className: string): JavaClassRaw | null;
    findClass(className: string, options: { resolveRefs: true }): JavaClassResolved | null;
    findClass(className: string, options?: { resolveRefs?: boolean }): JavaClassRaw | JavaClassResolved | null {
        if (options?.resolveRefs) {
            return this.findClassResolved(className);
        }
        return this.findClassRaw(className);
    }

    findClassRaw(className: string): JavaClassRaw | null {
        const descriptor = this.normalizeToDescriptor(className);
        const cached = this.rawClassCache.get(descriptor);
        if (cached !== undefined) {
            return cached;
        }

        const classDef = this.dexFile.findClassDef(descriptor);
        if (classDef === undefined) {
            this.rawClassCache.set(descriptor, null);
            return null;
        }

        const superClassName = classDef.superclassIdx === undefined
                ? null
                : this.typeName(classDef.superclassIdx);

        const interfaces = this.dexFile.getInterfaces(classDef).map((typeIdx) => this.typeName(typeIdx));

        const fields: JavaFieldRaw[] = [];
        const methods: JavaMethodRaw[] = [];
        const annotations = new MemberAnnotationLookup(this.dexFile, this.dexFile.getAnnotationsDirectory(classDef));

        const classData = this.dexFile.getClassData(classDef);
        if (classData !== undefined) {
            this.parseDexFields(classData.instanceFields, fields, annotations, []);
            this.parseDexFields(classData.staticFields, fields, annotations, this.dexFile.getStaticValues(classDef));

            this.parseDexMethods(classData.directMethods, methods, annotations);
            this.parseDexMethods(classData.virtualMethods, methods, annotations);
        }

        const cls: JavaClassRaw = {
            stub: false,
            accessFlags: classDef.accessFlags,
            name: DexUtils.descriptorToJavaType(descriptor),
            super: superClassName,
            interfaces,
            fields,
            methods,
            annotations: annotations.forClass(),
        };

        this.rawClassCache.set(descriptor, cls);
        return cls;
    }

    findClassResolved(className: string): JavaClassResolved | null {
        const descriptor = this.normalizeToDescriptor(className);
        const cached = this.resolvedClassCache.get(descriptor);
        if (cached !== undefined) {
            return cached;
        }

        const raw = this.findClassRaw(descriptor);
        if (raw === null) {
            return null;
        }

        const resolved: JavaClassResolved = {
            stub: false,
            accessFlags: raw.accessFlags,
            name: raw.name,
            super: null,
            interfaces: [],
            fields: [],
            methods: [],
            annotations: raw.annotations,
        };

        // Insert early to break cycles (e.g. self-referential or mutually-referential classes)
        this.resolvedClassCache.set(descriptor, resolved);
        if (raw.super !== undefined && raw.super !== null) {
            resolved.super = this.resolveTypeRef(raw.super);
        }
        resolved.interfaces = raw.interfaces.map((i) => this.resolveTypeRef(i));
        resolved.fields = raw.fields.map((f) => ({
            ...f,
            type: this.resolveTypeRef(f.type),
        }));
        resolved.methods = raw.methods.map((m) => ({
            ...m,
            returnType: this.resolveTypeRef(m.returnType),
            parameterTypes: m.parameterTypes.map((p) => this.resolveTypeRef(p)),
        }));

        return resolved;
    }

    private typeName(typeIdx: number): string {
        return DexUtils.descriptorToJavaType(this.dexFile.getTypeDescriptor(typeIdx));
    }

    /** `initialValues` pairs with `dexFields` by position. */
    private parseDexFields(
        dexFields: EncodedField[],
        out: JavaFieldRaw[],
        annotations: MemberAnnotationLookup,
        initialValues: EncodedValue[]
    ): void {
        dexFields.forEach((df, i) => {
            const fieldId = this.dexFile.getFieldId(df.fieldIdx);
            const field: JavaFieldRaw = {
                accessFlags: df.accessFlags,
                name: this.dexFile.getString(fieldId.nameIdx),
                type: this.typeName(fieldId.typeIdx),
                annotations: annotations.forField(df.fieldIdx),
            };
            if (i < initialValues.length) {
                field.initialValue = initialValues[i];
            }
            out.push(field);
        });
    }

    private parseDexMethods(dexMethods: EncodedMethod[], out: JavaMethodRaw[], annotations: MemberAnnotationLookup): void {
        for (const dm of dexMethods) {
            const methodId = this.dexFile.getMethodId(dm.methodIdx);
            const protoId = this.dexFile.getProtoId(methodId.protoIdx);

            out.push({
                accessFlags: dm.accessFlags,
                name: this.dexFile.getString(methodId.nameIdx),
                shorty: this.dexFile.getString(protoId.shortyIdx),
                returnType: this.typeName(protoId.returnTypeIdx),
                parameterTypes: this.dexFile.getProtoParameters(methodId.protoIdx).map((t) => this.typeName(t)),
                hasCode: dm.codeOff !== undefined,
                annotations: annotations.forMethod(dm.methodIdx),
                parameterAnnotations: annotations.forParameters(dm.methodIdx),
            });
        }
    }

    private normalizeToDescriptor(className: string): string {
        if (className.length > 0 && className[0] === "[") {
            return className.replace(/\./g, "/");
        }
        if (className.length > 1 && className[0] === "L" && className[className.length - 1] === ";") {
            return className.replace(/\./g, "/");
        }
        return DexUtils.dotToDescriptor(className);
    }

    private resolveTypeRef(className: string): JavaClassResolved {
        const descriptor = this.normalizeToDescriptor(className);
        let ret = this.findClassResolved(descriptor) ?? this.stubCache.get(descriptor);

        if (ret === undefined) {
            ret = {
                stub: true,
                accessFlags: 0,
                name: className,
                interfaces: [],
                fields: [],
                methods: [],
                annotations: [],
            };
            this.stubCache.set(descriptor, ret);
        }
        return ret;
    }
}

/** Annotation sets of one class, looked up by field or method index. */
class MemberAnnotationLookup {

    private readonly fields = new Map<number, number>();

    private readonly methods = new Map<number, number>();

    private readonly parameters = new Map<number, number>();

    private readonly dexFile: DexFile;

    private readonly directory?: AnnotationsDirectory;

    constructor(dexFile: DexFile, directory?: AnnotationsDirectory) {
        this.dexFile = dexFile;
        this.directory = directory;
        if (directory === undefined) {
            return;
        }
        for (const entry of directory.fieldAnnotations) this.fields.set(entry.memberIdx, entry.annotationsOff);
        for (const entry of directory.methodAnnotations) this.methods.set(entry.memberIdx, entry.annotationsOff);
        for (const entry of directory.parameterAnnotations) this.parameters.set(entry.memberIdx, entry.annotationsOff);
    }

    forClass(): AnnotationItem[] {
        return this.dexFile.getAnnotationSet(this.directory?.classAnnotationsOff ?? 0);
    }

    forField(fieldIdx: number): AnnotationItem[] {
        return this.dexFile.getAnnotationSet(this.fields.get(fieldIdx) ?? 0);
    }

    forMethod(methodIdx: number): AnnotationItem[] {
        return this.dexFile.getAnnotationSet(this.methods.get(methodIdx) ?? 0);
    }

    forParameters(methodIdx: number): AnnotationItem[][] {
        return this.dexFile.getAnnotationSetRefList(this.parameters.get(methodIdx) ?? 0);
    }
}
