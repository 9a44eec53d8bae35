import { describe, expect, it } from "vitest";
import {
  createEmitOptions,
  InvalidStateError,
  MemoryOutputStream,
  SourceSet,
} from "../index.js";
import {
  bind,
  compileMethods,
  finalizeModule,
  MODULE_ID_SECTION,
  readCustomSections,
  serializeModule,
  validateImage,
} from "../internal.js";
import { createSyntax } from "./support/syntax.js";

const counterSet = () => {
  const s = createSyntax("counter.kiln");
  return SourceSet.create({
    name: "counter",
    units: [
      s.unit({
        namespace: "App",
        types: [
          s.type("Counter", [
            s.method("next", {
              params: [["value", "i32"]],
              returns: "i32",
              body: [s.ret(s.bin("+", s.ref("value"), s.lit(1)))],
            }),
          ]),
        ],
      }),
    ],
  });
};

describe("staged pipeline", () => {
  it("walks a module through every phase in order", () => {
    const sourceSet = counterSet();
    const options = createEmitOptions();

    expect(bind(sourceSet).units).toHaveLength(1);
    const { module, diagnostics } = compileMethods({ sourceSet, options });
    expect(diagnostics).toEqual([]);
    if (!module) throw new Error("expected a module");
    expect(module.phase).toBe("open");

    finalizeModule({ sourceSet, module });
    expect(module.phase).toBe("finalized");

    const image = new MemoryOutputStream();
    const result = serializeModule({ module, streams: { image } });
    expect(result.success).toBe(true);
    expect(module.phase).toBe("serialized");

    const bytes = image.toUint8Array();
    expect(validateImage(bytes)).toBe(true);
    const moduleId = readCustomSections(bytes).find((section) => section.name === MODULE_ID_SECTION);
    expect(moduleId && new TextDecoder().decode(moduleId.data)).toBe(module.identity.moduleId);

    module.dispose();
    expect(module.phase).toBe("disposed");
  });

  it("rejects serialization of a module that is still open", () => {
    const sourceSet = counterSet();
    bind(sourceSet);
    const { module } = compileMethods({ sourceSet, options: createEmitOptions() });
    if (!module) throw new Error("expected a module");

    expect(() =>
      serializeModule({ module, streams: { image: new MemoryOutputStream() } }),
    ).toThrow(InvalidStateError);
    module.dispose();
  });
});
