/**
 * Processor Package - Dispatch Tests
 *
 * Directive routing, include batches and per-element failure isolation.
 */

import { describe, it, expect, vi } from "vitest";
import {
  DirectiveIdentity,
  MemorySink,
  UnknownDirectiveError,
  VG0001_DIRECTIVE_UNRESOLVED,
  VG0002_TARGETS_UNRESOLVED,
  VG0010_UNRESOLVED_REFERENCE,
  VG0011_NO_ENCLOSING_NAMESPACE,
  VG0020_INVALID_DECLARATION_KIND,
  VG0030_EMISSION_FAILED,
  VG0090_OPTION_NOTE,
  createCollectingReporter,
  createRecordProcessor,
  supportedDirectives,
} from "@valuegen/processor";
import {
  FailingSink,
  FakeBuilders,
  FakeInterfaces,
  bool,
  createFakeEnvironment,
  iface,
  namespace,
  plainClass,
  record,
  ref,
  str,
  targets,
  type FakeDeclaration,
} from "./_helpers/fake-host.js";

const { BUILDER, BUILDER_INCLUDE, INTERFACE, INTERFACE_INCLUDE } = DirectiveIdentity;

function round(...entries: [string, FakeDeclaration[]][]) {
  return { directives: new Map(entries) };
}

describe("supportedDirectives", () => {
  it("claims exactly the four directive identities", () => {
    expect([...supportedDirectives()].sort()).toEqual([
      "valuegen.RecordBuilder",
      "valuegen.RecordBuilder.Include",
      "valuegen.RecordInterface",
      "valuegen.RecordInterface.Include",
    ]);
  });
});

describe("builder directive", () => {
  it("emits a builder next to the value type", () => {
    const geo = namespace("geo");
    const point = record("Point", geo).withDirective(BUILDER);
    const { processor, reporter, sink } = createFakeEnvironment();

    processor.process(BUILDER, point);

    expect(reporter.errors()).toEqual([]);
    expect([...sink.files.keys()]).toEqual(["geo.PointBuilder"]);
    expect(sink.files.get("geo.PointBuilder")).toBe(
      "// Auto generated by valuegen. Do not edit.\n" +
      "\n" +
      "// @generated by valuegen.RecordBuilder\n" +
      "export class PointBuilder {\n" +
      "    value = 1;\n" +
      "}\n",
    );
  });

  it("uses the bare name for the root namespace", () => {
    const point = record("Point", namespace("")).withDirective(BUILDER);
    const { processor, sink } = createFakeEnvironment();

    processor.process(BUILDER, point);

    expect([...sink.files.keys()]).toEqual(["PointBuilder"]);
  });

  it("rejects a declaration that is not a value type", () => {
    const service = plainClass("Service", namespace("app")).withDirective(BUILDER);
    const { processor, reporter, sink, builders } = createFakeEnvironment();

    processor.process(BUILDER, service);

    expect(reporter.errors()).toHaveLength(1);
    expect(reporter.errors()[0]).toMatchObject({
      code: VG0020_INVALID_DECLARATION_KIND,
      message: "RecordBuilder only valid for value types.",
      element: service,
    });
    expect(sink.files.size).toBe(0);
    expect(builders.calls).toEqual([]);
  });

  it("applies configured options and notes them", () => {
    const point = record("Point", namespace("geo")).withDirective(BUILDER);
    const { processor, reporter, sink } = createFakeEnvironment({
      "valuegen.suffix": "Maker",
      "valuegen.fileComment": "",
      "valuegen.fileIndent": "\\t",
    });

    processor.process(BUILDER, point);

    expect(sink.files.get("geo.PointMaker")).toBe(
      "// @generated by valuegen.RecordBuilder\n" +
      "export class PointMaker {\n" +
      "\tvalue = 1;\n" +
      "}\n",
    );
    const notes = reporter.diagnostics.filter(d => d.code === VG0090_OPTION_NOTE);
    expect(notes.map(n => n.message)).toEqual([
      'valuegen option suffix = "Maker"',
      'valuegen option fileComment = ""',
      'valuegen option fileIndent = "\\t"',
    ]);
    expect(notes.every(n => n.severity === "note" && n.element === point)).toBe(true);
  });
});

describe("interface directive", () => {
  it("emits the rewritten value type and its builder", () => {
    const people = namespace("people");
    const person = iface("Person", people).withDirective(INTERFACE);
    const { processor, reporter, sink } = createFakeEnvironment({ "valuegen.fileComment": "" });

    processor.process(INTERFACE, person);

    expect(reporter.errors()).toEqual([]);
    expect([...sink.files.keys()]).toEqual(["people.PersonRecord", "people.PersonRecordBuilder"]);
    expect(sink.files.get("people.PersonRecord")).toBe(
      "export value class PersonRecord {\n" +
      "    readonly name: string;\n" +
      "}\n",
    );
  });

  it("skips the builder when addBuilder is false", () => {
    const person = iface("Person", namespace("people")).withDirective(INTERFACE, { addBuilder: bool(false) });
    const { processor, sink } = createFakeEnvironment();

    processor.process(INTERFACE, person);

    expect([...sink.files.keys()]).toEqual(["people.PersonRecord"]);
  });

  it("rejects a declaration that is not interface-like without affecting others", () => {
    const app = namespace("app");
    const point = record("Point", app).withDirective(INTERFACE);
    const person = iface("Person", app).withDirective(INTERFACE);
    const line = record("Line", app).withDirective(BUILDER);
    const { processor, reporter, sink } = createFakeEnvironment();

    const claimed = processor.processRound(round([INTERFACE, [point, person]], [BUILDER, [line]]));

    expect(claimed).toBe(true);
    expect(reporter.errors()).toHaveLength(1);
    expect(reporter.errors()[0]).toMatchObject({
      code: VG0020_INVALID_DECLARATION_KIND,
      message: "RecordInterface only valid for interface-like declarations.",
      element: point,
    });
    expect([...sink.files.keys()].sort()).toEqual([
      "app.LineBuilder",
      "app.PersonRecord",
      "app.PersonRecordBuilder",
    ]);
  });

  it("emits nothing when the synthesizer rejects the declaration", () => {
    const broken = iface("BrokenShape", namespace("app")).withDirective(INTERFACE);
    const { processor, reporter, sink } = createFakeEnvironment();

    processor.process(INTERFACE, broken);

    expect(reporter.errors()).toHaveLength(1);
    expect(sink.files.size).toBe(0);
  });
});

describe("include directives", () => {
  it("generates into the pattern namespace for every target", () => {
    const geo = namespace("geo");
    const app = namespace("app");
    const point = record("Point", geo);
    const line = record("Line", geo);
    const host = plainClass("Builders", app).withDirective(BUILDER_INCLUDE, {
      targets: targets(ref(point), ref(line)),
      namespacePattern: str("@.builders"),
    });
    const { processor, reporter, sink } = createFakeEnvironment();

    processor.process(BUILDER_INCLUDE, host);

    expect(reporter.errors()).toEqual([]);
    expect([...sink.files.keys()]).toEqual(["app.builders.PointBuilder", "app.builders.LineBuilder"]);
  });

  it("defaults the pattern to the target namespace", () => {
    const point = record("Point", namespace("geo"));
    const host = plainClass("Builders", namespace("app")).withDirective(BUILDER_INCLUDE, {
      targets: targets(ref(point)),
    });
    const { processor, sink } = createFakeEnvironment();

    processor.process(BUILDER_INCLUDE, host);

    expect([...sink.files.keys()]).toEqual(["geo.PointBuilder"]);
  });

  it("reports an empty target list once and emits nothing", () => {
    const host = plainClass("Builders", namespace("app")).withDirective(BUILDER_INCLUDE, {
      targets: targets(),
    });
    const { processor, reporter, sink } = createFakeEnvironment();

    processor.process(BUILDER_INCLUDE, host);

    expect(reporter.errors()).toHaveLength(1);
    expect(reporter.errors()[0]).toMatchObject({
      code: VG0002_TARGETS_UNRESOLVED,
      message: "Could not resolve target list for: valuegen.RecordBuilder.Include",
      element: host,
    });
    expect(sink.files.size).toBe(0);
  });

  it("reports a missing target list once and emits nothing", () => {
    const host = plainClass("Builders", namespace("app")).withDirective(INTERFACE_INCLUDE, {
      namespacePattern: str("*"),
    });
    const { processor, reporter, sink } = createFakeEnvironment();

    processor.process(INTERFACE_INCLUDE, host);

    expect(reporter.errors().map(d => d.code)).toEqual([VG0002_TARGETS_UNRESOLVED]);
    expect(sink.files.size).toBe(0);
  });

  it("reports a directive that is not attached to the host", () => {
    const host = plainClass("Builders", namespace("app"));
    const { processor, reporter } = createFakeEnvironment();

    processor.process(BUILDER_INCLUDE, host);

    expect(reporter.errors()).toHaveLength(1);
    expect(reporter.errors()[0]).toMatchObject({
      code: VG0001_DIRECTIVE_UNRESOLVED,
      message: "Could not resolve directive for: valuegen.RecordBuilder.Include",
    });
  });

  it.each([
    ["first", 0],
    ["middle", 1],
    ["last", 2],
  ])("isolates an unresolvable %s target", (_position, index) => {
    const geo = namespace("geo");
    const resolvable = [record("Point", geo), record("Line", geo)];
    const refs = resolvable.map(r => ref(r));
    refs.splice(index, 0, ref(null, "Circle"));
    const host = plainClass("Builders", namespace("app")).withDirective(BUILDER_INCLUDE, {
      targets: targets(...refs),
    });
    const { processor, reporter, sink } = createFakeEnvironment();

    processor.process(BUILDER_INCLUDE, host);

    expect(reporter.errors()).toHaveLength(1);
    expect(reporter.errors()[0]).toMatchObject({
      code: VG0010_UNRESOLVED_REFERENCE,
      message: "Could not resolve declaration for: Circle",
      element: host,
    });
    expect([...sink.files.keys()]).toEqual(["geo.PointBuilder", "geo.LineBuilder"]);
  });

  it("skips a target without an enclosing namespace", () => {
    const orphan = record("Orphan", null);
    const point = record("Point", namespace("geo"));
    const host = plainClass("Builders", namespace("app")).withDirective(BUILDER_INCLUDE, {
      targets: targets(ref(orphan), ref(point)),
    });
    const { processor, reporter, sink } = createFakeEnvironment();

    processor.process(BUILDER_INCLUDE, host);

    expect(reporter.errors()).toHaveLength(1);
    expect(reporter.errors()[0]).toMatchObject({
      code: VG0011_NO_ENCLOSING_NAMESPACE,
      element: orphan,
    });
    expect([...sink.files.keys()]).toEqual(["geo.PointBuilder"]);
  });

  it("validates each included target", () => {
    const app = namespace("app");
    const service = plainClass("Service", app);
    const point = record("Point", app);
    const host = plainClass("Builders", app).withDirective(BUILDER_INCLUDE, {
      targets: targets(ref(service), ref(point)),
    });
    const { processor, reporter, sink } = createFakeEnvironment();

    processor.process(BUILDER_INCLUDE, host);

    expect(reporter.errors().map(d => [d.code, d.element])).toEqual([
      [VG0020_INVALID_DECLARATION_KIND, service],
    ]);
    expect([...sink.files.keys()]).toEqual(["app.PointBuilder"]);
  });

  it("passes addBuilder to the interface path", () => {
    const people = namespace("people");
    const person = iface("Person", people);
    const pet = iface("Pet", people);
    const host = plainClass("Values", namespace("app")).withDirective(INTERFACE_INCLUDE, {
      targets: targets(ref(person), ref(pet)),
      namespacePattern: str("*.values"),
      addBuilder: bool(false),
    });
    const { processor, sink } = createFakeEnvironment();

    processor.process(INTERFACE_INCLUDE, host);

    expect([...sink.files.keys()]).toEqual(["people.values.PersonRecord", "people.values.PetRecord"]);
  });

  it("adds builders for included interfaces by default", () => {
    const person = iface("Person", namespace("people"));
    const host = plainClass("Values", namespace("app")).withDirective(INTERFACE_INCLUDE, {
      targets: targets(ref(person)),
    });
    const { processor, sink } = createFakeEnvironment();

    processor.process(INTERFACE_INCLUDE, host);

    expect([...sink.files.keys()]).toEqual(["people.PersonRecord", "people.PersonRecordBuilder"]);
  });

  it("produces identical output when the same round runs again", () => {
    const geo = namespace("geo");
    const host = plainClass("Builders", namespace("app")).withDirective(BUILDER_INCLUDE, {
      targets: targets(ref(record("Point", geo)), ref(null, "Gone"), ref(record("Line", geo))),
      namespacePattern: str("*.@"),
    });
    const first = createFakeEnvironment();
    const second = createFakeEnvironment();

    first.processor.processRound(round([BUILDER_INCLUDE, [host]]));
    second.processor.processRound(round([BUILDER_INCLUDE, [host]]));

    expect([...second.sink.files]).toEqual([...first.sink.files]);
    expect(second.reporter.diagnostics.map(d => [d.code, d.message]))
      .toEqual(first.reporter.diagnostics.map(d => [d.code, d.message]));
    expect([...first.sink.files.keys()]).toEqual(["geo.app.PointBuilder", "geo.app.LineBuilder"]);
  });
});

describe("emission failures", () => {
  function createFailingEnvironment(failures: ConstructorParameters<typeof FailingSink>[0]) {
    const reporter = createCollectingReporter<FakeDeclaration>();
    const sink = new FailingSink(failures);
    const processor = createRecordProcessor<FakeDeclaration>({
      reporter,
      sink,
      options: {},
      builders: new FakeBuilders(),
      interfaces: new FakeInterfaces(),
    });
    return { processor, reporter, sink };
  }

  it("reports a failed open with its detail and continues the batch", () => {
    const geo = namespace("geo");
    const host = plainClass("Builders", namespace("app")).withDirective(BUILDER_INCLUDE, {
      targets: targets(ref(record("Point", geo)), ref(record("Line", geo))),
    });
    const { processor, reporter, sink } = createFailingEnvironment(
      new Map([["geo.PointBuilder", { phase: "open" as const, error: new Error("disk full") }]]),
    );

    processor.process(BUILDER_INCLUDE, host);

    expect(reporter.errors()).toHaveLength(1);
    expect(reporter.errors()[0]).toMatchObject({
      code: VG0030_EMISSION_FAILED,
      message: "Could not create source file: disk full",
    });
    expect([...sink.files.keys()]).toEqual(["geo.LineBuilder"]);
  });

  it("reports a failure without detail using the bare message", () => {
    const point = record("Point", namespace("geo"));
    const { processor, reporter } = createFailingEnvironment(
      new Map([["geo.PointBuilder", { phase: "open" as const, error: new Error("") }]]),
    );

    processor.process(BUILDER, point);

    expect(reporter.errors().map(d => d.message)).toEqual(["Could not create source file"]);
  });

  it("closes the writer when writing fails", () => {
    const point = record("Point", namespace("geo"));
    const { processor, reporter, sink } = createFailingEnvironment(
      new Map([["geo.PointBuilder", { phase: "write" as const, error: new Error("broken pipe") }]]),
    );

    processor.process(BUILDER, point);

    expect(sink.closed).toEqual(["geo.PointBuilder"]);
    expect(reporter.errors().map(d => d.message)).toEqual(["Could not create source file: broken pipe"]);
  });

  it("does not emit the builder when the value type could not be written", () => {
    const person = iface("Person", namespace("people"));
    const { processor, reporter, sink } = createFailingEnvironment(
      new Map([["people.PersonRecord", { phase: "open" as const, error: new Error("read-only") }]]),
    );

    processor.process(INTERFACE, person);

    expect(reporter.errors()).toHaveLength(1);
    expect(sink.files.size).toBe(0);
  });

  it("reports recreating a file that was already written", () => {
    const point = record("Point", namespace("geo"));
    const { processor, reporter, sink } = createFakeEnvironment();

    processor.process(BUILDER, point);
    processor.process(BUILDER, point);

    expect(reporter.errors().map(d => d.message)).toEqual([
      "Could not create source file: Attempt to recreate a file for type geo.PointBuilder",
    ]);
    expect(sink.files.size).toBe(1);
  });
});

describe("unknown directives", () => {
  it("throws instead of reporting", () => {
    const point = record("Point", namespace("geo"));
    const { processor, reporter } = createFakeEnvironment();

    expect(() => processor.process("valuegen.RecordWither", point)).toThrow(UnknownDirectiveError);
    expect(reporter.diagnostics).toEqual([]);
  });
});

describe("logging", () => {
  it("logs each dispatch and each written file", () => {
    const logger = { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const processor = createRecordProcessor<FakeDeclaration>({
      reporter: createCollectingReporter<FakeDeclaration>(),
      sink: new MemorySink(),
      options: {},
      builders: new FakeBuilders(),
      interfaces: new FakeInterfaces(),
      logger,
    });

    processor.process(INTERFACE, iface("Person", namespace("people")));

    expect(logger.log.mock.calls).toEqual([
      ["RecordInterface on people.Person"],
      ["Wrote PersonRecord"],
      ["Wrote PersonRecordBuilder"],
    ]);
    expect(logger.error).not.toHaveBeenCalled();
  });
});
