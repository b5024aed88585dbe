/**
 * Processor Package - Namespace Resolution Tests
 */

import { describe, it, expect } from "vitest";
import {
  VG0011_NO_ENCLOSING_NAMESPACE,
  buildNamespaceName,
  createCollectingReporter,
  findEnclosingNamespace,
  resolveEnclosingNamespace,
} from "@valuegen/processor";
import { FakeDeclaration, namespace, plainClass, record } from "./_helpers/fake-host.js";

describe("findEnclosingNamespace", () => {
  it("walks past nested declarations", () => {
    const geo = namespace("geo");
    const outer = plainClass("Shapes", geo);
    const inner = new FakeDeclaration("CLASS", "Inner", outer);
    const point = record("Point", inner);

    expect(findEnclosingNamespace(point)).toBe(geo);
  });

  it("does not consider the node itself", () => {
    expect(findEnclosingNamespace(namespace("geo"))).toBeNull();
  });

  it("handles a deep chain", () => {
    const root = namespace("deep");
    let current = plainClass("Level0", root);
    for (let i = 1; i < 5000; i++) {
      current = plainClass(`Level${i}`, current);
    }
    expect(findEnclosingNamespace(current)).toBe(root);
  });
});

describe("resolveEnclosingNamespace", () => {
  it("reports at the originating element when the chain has no namespace", () => {
    const reporter = createCollectingReporter<FakeDeclaration>();
    const orphan = record("Orphan", null);
    const host = plainClass("Host", namespace("app"));

    expect(resolveEnclosingNamespace(orphan, reporter, host)).toBeUndefined();
    expect(reporter.diagnostics).toEqual([
      {
        code: VG0011_NO_ENCLOSING_NAMESPACE,
        severity: "error",
        message: "Element has no enclosing namespace",
        element: host,
      },
    ]);
  });
});

describe("buildNamespaceName", () => {
  const app = namespace("foo");
  const host = plainClass("Builders", app);
  const geo = namespace("bar");
  const target = record("Point", geo);

  it.each([
    ["*", "bar"],
    ["@", "foo"],
    ["*.@", "bar.foo"],
    ["@.*", "foo.bar"],
    ["@.builders", "foo.builders"],
    ["*.generated", "bar.generated"],
    ["fixed.place", "fixed.place"],
    ["*.*", "bar.bar"],
  ])("renders %s as %s", (pattern, expected) => {
    const reporter = createCollectingReporter<FakeDeclaration>();
    expect(buildNamespaceName(pattern, host, target, reporter)).toBe(expected);
    expect(reporter.diagnostics).toEqual([]);
  });

  it("uses the host itself when it is a namespace", () => {
    const reporter = createCollectingReporter<FakeDeclaration>();
    expect(buildNamespaceName("@.impl", namespace("pkg"), target, reporter)).toBe("pkg.impl");
  });

  it("inserts names containing $ literally", () => {
    const reporter = createCollectingReporter<FakeDeclaration>();
    const odd = record("Point", namespace("a$&b"));
    expect(buildNamespaceName("*.x", host, odd, reporter)).toBe("a$&b.x");
  });

  it("does not resolve the host namespace unless the pattern needs it", () => {
    const reporter = createCollectingReporter<FakeDeclaration>();
    const orphanHost = plainClass("Loose", null);
    expect(buildNamespaceName("*.gen", orphanHost, target, reporter)).toBe("bar.gen");
    expect(reporter.diagnostics).toEqual([]);
  });

  it("fails when the host has no namespace and the pattern needs one", () => {
    const reporter = createCollectingReporter<FakeDeclaration>();
    const orphanHost = plainClass("Loose", null);
    expect(buildNamespaceName("@", orphanHost, target, reporter)).toBeUndefined();
    expect(reporter.diagnostics.map(d => [d.code, d.element])).toEqual([
      [VG0011_NO_ENCLOSING_NAMESPACE, orphanHost],
    ]);
  });

  it("fails when the target has no namespace", () => {
    const reporter = createCollectingReporter<FakeDeclaration>();
    const orphan = record("Orphan", null);
    expect(buildNamespaceName("*", host, orphan, reporter)).toBeUndefined();
    expect(reporter.diagnostics.map(d => d.element)).toEqual([orphan]);
  });

  it("leaves an @ inside the target namespace untouched", () => {
    const reporter = createCollectingReporter<FakeDeclaration>();
    const shared = record("Point", namespace("@shared.geo"));
    expect(buildNamespaceName("*", host, shared, reporter)).toBe("@shared.geo");
    expect(buildNamespaceName("@.*", host, shared, reporter)).toBe("foo.@shared.geo");
    expect(reporter.diagnostics).toEqual([]);
  });

  it("leaves a * inside the host namespace untouched", () => {
    const reporter = createCollectingReporter<FakeDeclaration>();
    expect(buildNamespaceName("@.x", namespace("a*b"), target, reporter)).toBe("a*b.x");
  });

  it("resolves a target-only pattern when the host has no namespace", () => {
    const reporter = createCollectingReporter<FakeDeclaration>();
    const shared = record("Point", namespace("@shared"));
    expect(buildNamespaceName("*", plainClass("Loose", null), shared, reporter)).toBe("@shared");
    expect(reporter.diagnostics).toEqual([]);
  });

  it("renders the root namespace as an empty string", () => {
    const reporter = createCollectingReporter<FakeDeclaration>();
    const rooted = record("Point", namespace(""));
    expect(buildNamespaceName("*", host, rooted, reporter)).toBe("");
  });
});
