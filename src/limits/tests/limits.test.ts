import { describe, expect, it } from "vitest";
import type { PartHeaders } from "@/parser";
import { compileRules } from "@/selector";
import {
  createLimitEnforcer,
  DEFAULT_LIMITS,
  fileExtension,
  matchesMimeType,
  resolveLimits,
} from "../limits";

function filePart(contentType: string, fileName = "a.bin"): PartHeaders {
  return { fieldName: "file", fileName, contentType, raw: [] };
}

const fieldPart: PartHeaders = {
  fieldName: "title",
  contentType: "text/plain",
  raw: [],
};

describe("resolveLimits", () => {
  it("fills in defaults", () => {
    expect(resolveLimits({ maxFiles: 3 })).toEqual({ ...DEFAULT_LIMITS, maxFiles: 3 });
  });

  it("uses the documented defaults", () => {
    expect(DEFAULT_LIMITS).toEqual({
      maxFileSize: 10_485_760,
      maxFieldSize: 1_048_576,
      maxFiles: 10,
      maxFields: 100,
      maxBodySize: 20_971_520,
      maxHeaderSize: 16_384,
      maxFieldNameSize: 200,
    });
  });
});

describe("matchesMimeType", () => {
  it("matches literal types case-insensitively, ignoring parameters", () => {
    expect(matchesMimeType("Text/Plain; charset=utf-8", ["text/plain"])).toBe(true);
  });

  it("matches type wildcards", () => {
    expect(matchesMimeType("image/png", ["image/*"])).toBe(true);
    expect(matchesMimeType("imagex/png", ["image/*"])).toBe(false);
  });

  it("matches everything with */* or *", () => {
    expect(matchesMimeType("application/zip", ["*/*"])).toBe(true);
    expect(matchesMimeType("application/zip", ["*"])).toBe(true);
  });

  it("rejects types not listed", () => {
    expect(matchesMimeType("application/pdf", ["image/png", "text/*"])).toBe(false);
  });
});

describe("fileExtension", () => {
  it("returns the lowercased extension", () => {
    expect(fileExtension("Report.PDF")).toBe(".pdf");
  });

  it("returns an empty string for dotfiles and names without a dot", () => {
    expect(fileExtension(".env")).toBe("");
    expect(fileExtension("README")).toBe("");
  });

  it("looks at the last path segment only", () => {
    expect(fileExtension("dir.v2/file")).toBe("");
  });
});

describe("createLimitEnforcer", () => {
  it("allows a body exactly at maxBodySize", () => {
    const enforcer = createLimitEnforcer(resolveLimits({ maxBodySize: 10 }));
    expect(enforcer.observeChunk(6).isOk).toBe(true);
    expect(enforcer.observeChunk(4).isOk).toBe(true);
    const over = enforcer.observeChunk(1);
    expect(over.error?.code).toBe("BODY_TOO_LARGE");
    expect(over.error?.statusCode).toBe(413);
    expect(enforcer.totals().bodyBytes).toBe(10);
  });

  it("counts files from one", () => {
    const enforcer = createLimitEnforcer(resolveLimits({ maxFiles: 2 }));
    expect(enforcer.beginFile(filePart("text/plain"), null).isOk).toBe(true);
    expect(enforcer.beginFile(filePart("text/plain"), null).isOk).toBe(true);
    const third = enforcer.beginFile(filePart("text/plain"), null);
    expect(third.error?.code).toBe("TOO_MANY_FILES");
    expect(third.error?.data).toEqual({ limit: "maxFiles", max: 2, received: 3 });
  });

  it("counts fields from one", () => {
    const enforcer = createLimitEnforcer(resolveLimits({ maxFields: 1 }));
    expect(enforcer.beginField(fieldPart).value).toBe(DEFAULT_LIMITS.maxFieldSize);
    expect(enforcer.beginField(fieldPart).error?.code).toBe("TOO_MANY_FIELDS");
  });

  it("returns the rule size override", () => {
    const rules = compileRules([{ kind: "single", name: "file", maxFileSize: 5 }]);
    const enforcer = createLimitEnforcer(resolveLimits());
    const begun = enforcer.beginFile(filePart("text/plain"), rules.byName.get("file") ?? null);
    expect(begun.value).toBe(5);
  });

  it("enforces file size inclusively", () => {
    const enforcer = createLimitEnforcer(resolveLimits({ maxFileSize: 4 }));
    enforcer.beginFile(filePart("text/plain"), null);
    expect(enforcer.observePartData(4).isOk).toBe(true);
    const over = enforcer.observePartData(1);
    expect(over.error?.code).toBe("FILE_TOO_LARGE");
    expect(over.error?.data).toEqual({ field: "file", limit: "maxFileSize", max: 4 });
  });

  it("enforces field size", () => {
    const enforcer = createLimitEnforcer(resolveLimits({ maxFieldSize: 3 }));
    enforcer.beginField(fieldPart);
    const over = enforcer.observePartData(4);
    expect(over.error?.code).toBe("FIELD_TOO_LARGE");
    expect(over.error?.message).toBe("field 'title' exceeds 3 bytes");
  });

  it("resets the part counter for each part", () => {
    const enforcer = createLimitEnforcer(resolveLimits({ maxFileSize: 4 }));
    enforcer.beginFile(filePart("text/plain"), null);
    enforcer.observePartData(4);
    enforcer.beginFile(filePart("text/plain"), null);
    expect(enforcer.observePartData(4).isOk).toBe(true);
  });

  it("checks the global MIME allowlist", () => {
    const enforcer = createLimitEnforcer(resolveLimits(), { mimeTypes: ["image/*"] });
    const result = enforcer.beginFile(filePart("application/pdf"), null);
    expect(result.error?.code).toBe("DISALLOWED_MIME_TYPE");
    expect(result.error?.statusCode).toBe(415);
    expect(result.error?.data).toEqual({
      field: "file",
      mime: "application/pdf",
      allowed: ["image/*"],
    });
  });

  it("lets a rule allowlist replace the global one", () => {
    const rules = compileRules([
      { kind: "single", name: "file", allowedMimeTypes: ["application/pdf"] },
    ]);
    const enforcer = createLimitEnforcer(resolveLimits(), { mimeTypes: ["image/*"] });
    const result = enforcer.beginFile(
      filePart("application/pdf"),
      rules.byName.get("file") ?? null
    );
    expect(result.isOk).toBe(true);
  });

  it("checks the extension allowlist", () => {
    const enforcer = createLimitEnforcer(resolveLimits(), { extensions: [".PNG"] });
    expect(enforcer.beginFile(filePart("image/png", "a.png"), null).isOk).toBe(true);
    const result = enforcer.beginFile(filePart("image/png", "a.exe"), null);
    expect(result.error?.code).toBe("DISALLOWED_EXTENSION");
  });
});
