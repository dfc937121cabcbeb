import { DexFile } from "./DexFile";
import type { DexClass } from "./DexFile";
import type { EncodedField, EncodedMethod } from "./classdata";
import type { DexFileOptions } from "./config";
import { attempt } from "./errors";
import type { DexResult } from "./errors";

export { DexFile };
export type { DexClass };
export * from "./accessflags";
export * from "./annotations";
export * from "./binary";
export * from "./classdata";
export * from "./classdef";
export * from "./classdump";
export * from "./classloader";
export * from "./code";
export * from "./config";
export * from "./debuginfo";
export * from "./encodedvalue";
export * from "./errors";
export * from "./header";
export * from "./instructions";
export * from "./leb128";
export * from "./maplist";
export * from "./methodhandles";
export * from "./mutf8";
export * from "./pools";
export * from "./typelist";
export * from "./utils";


export namespace Dex {

    export interface Method {
        accessFlags: number;
        name: string;
        returnType: string;
        parameterTypes: string[];
    }

    export interface Field {
        accessFlags: number;
        name: string;
        type: string;
    }

    export interface Class {
        accessFlags: number;
        name: string;
        /** Empty for java.lang.Object. */
        super: string;
        interfaces?: string[] | null;
        fields?: Field[] | null;
        methods?: Method[] | null;
    }

    /**
     * Decodes every class into plain descriptor-keyed objects. A class that
     * fails to decode is reported through the logger and left out.
     */
    export function parseDexFile(bytes: Uint8Array, options?: DexFileOptions): Class[] {
        const dex = new DexFile(bytes, options);

        function toField(ef: EncodedField): Field {
            const fid = dex.getFieldId(ef.fieldIdx);
            return {
                accessFlags: ef.accessFlags,
                name: dex.getString(fid.nameIdx),
                type: dex.getTypeDescriptor(fid.typeIdx),
            };
        }

        function toMethod(em: EncodedMethod): Method {
            const mid = dex.getMethodId(em.methodIdx);
            const proto = dex.getProtoId(mid.protoIdx);
            return {
                accessFlags: em.accessFlags,
                name: dex.getString(mid.nameIdx),
                returnType: dex.getTypeDescriptor(proto.returnTypeIdx),
                parameterTypes: dex.getProtoParameters(mid.protoIdx).map((t) => dex.getTypeDescriptor(t)),
            };
        }

        function toClass(cls: DexClass): Class {
            const data = cls.classData;
            const fields: Field[] = data === undefined
                    ? []
                    : [...data.staticFields, ...data.instanceFields].map(toField);
            const methods: Method[] = data === undefined
                    ? []
                    : [...data.directMethods, ...data.virtualMethods].map(toMethod);

            return {
                accessFlags: cls.def.accessFlags,
                name: cls.descriptor,
                super: cls.superclass ?? "",
                interfaces: cls.interfaces.length ? cls.interfaces : null,
                fields: fields.length ? fields : null,
                methods: methods.length ? methods : null,
            };
        }

        function convert(cls: DexClass): DexResult<Class> {
            return attempt(() => toClass(cls));
        }

        const classes: Class[] = [];
        let index = 0;
        for (const result of dex.classes()) {
            const converted: DexResult<Class> = result.ok ? convert(result.value) : result;
            if (converted.ok) {
                classes.push(converted.value);
            } else {
                dex.options.logger.warn(`skipping class_defs[${index}]: ${converted.error.message}`);
            }
            index++;
        }

        return classes;
    }
}
