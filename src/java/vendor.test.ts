import { describe, expect, it } from "vitest";

import {
  UNKNOWN,
  deriveJavaName,
  inferVendorFromPath,
  inferVersionFromName,
  javaFingerprint,
} from "./vendor.js";

describe("inferVendorFromPath", () => {
  it("matches well-known distribution names", () => {
    expect(inferVendorFromPath("/usr/lib/jvm/java-17-openjdk-amd64")).toBe("OpenJDK");
    expect(inferVendorFromPath("/Library/Java/JavaVirtualMachines/zulu-17.jdk")).toBe("Azul Zulu");
    expect(inferVendorFromPath("C:\\Program Files\\Amazon Corretto\\jdk21")).toBe("Amazon Corretto");
  });

  it("prefers the more specific distribution over plain OpenJDK", () => {
    expect(inferVendorFromPath("/opt/temurin-openjdk-17")).toBe("Eclipse Adoptium");
  });

  it("returns null for unrecognized paths", () => {
    expect(inferVendorFromPath("/opt/custom-build")).toBeNull();
  });
});

describe("inferVersionFromName", () => {
  it("takes the first dotted number", () => {
    expect(inferVersionFromName("java-17-openjdk-amd64")).toBe("17");
    expect(inferVersionFromName("jdk-17.0.2+8")).toBe("17.0.2");
    expect(inferVersionFromName("jdk1.8.0_292")).toBe("1.8.0");
    expect(inferVersionFromName("temurin-21.jdk")).toBe("21");
  });

  it("returns null without digits", () => {
    expect(inferVersionFromName("current")).toBeNull();
  });
});

describe("javaFingerprint", () => {
  it("is undefined when the version is unknown", () => {
    expect(javaFingerprint("OpenJDK", "17.0.2")).toBe("OpenJDK@17.0.2");
    expect(javaFingerprint("OpenJDK", UNKNOWN)).toBeUndefined();
  });
});

describe("deriveJavaName", () => {
  it("drops the bundle suffix and the dash after jdk", () => {
    expect(deriveJavaName("jdk-17")).toBe("jdk17");
    expect(deriveJavaName("temurin-21.jdk")).toBe("temurin-21");
    expect(deriveJavaName("jre-8")).toBe("jre8");
  });
});
