import { DexImage, DexImageBuilder } from "./DexImageBuilder";

export const GREETER = "Lcom/example/Greeter;";
export const EMPTY = "Lcom/example/Empty;";

/**
 * An abstract class with one member of every kind, plus a class with no
 * class data.
 */
export function greeterImage(): DexImage {
  return new DexImageBuilder()
    .addClass({
      descriptor: GREETER,
      accessFlags: 0x401,
      superclass: "Ljava/lang/Object;",
      interfaces: ["Ljava/lang/Runnable;"],
      sourceFile: "Greeter.java",
      staticFields: [{ name: "COUNT", type: "I", accessFlags: 0x19 }],
      instanceFields: [{ name: "name", type: "Ljava/lang/String;", accessFlags: 0x2 }],
      directMethods: [
        {
          name: "<init>",
          returnType: "V",
          parameters: ["Ljava/lang/String;"],
          accessFlags: 0x10001,
          code: { registersSize: 2, insSize: 2, insns: [0x000e] },
        },
      ],
      virtualMethods: [
        {
          name: "run",
          returnType: "V",
          accessFlags: 0x1,
          // line 5, no parameters, one position at address 0
          code: { registersSize: 1, insSize: 1, insns: [0x000e], debugInfo: [0x05, 0x00, 0x0e, 0x00] },
        },
        { name: "greet", returnType: "Ljava/lang/String;", parameters: ["I"], accessFlags: 0x401 },
      ],
      // one int: 42
      staticValues: [0x01, 0x04, 0x2a],
    })
    .addClass({ descriptor: EMPTY, superclass: "Ljava/lang/Object;" })
    .build();
}
