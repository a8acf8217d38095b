import { describe, it, expect } from "vitest";
import { ToolError, ToolErrorCode, withErrorContext } from "../errors.js";

describe("withErrorContext", () => {
  it("returns the operation's result", async () => {
    await expect(withErrorContext(async () => 42, ToolErrorCode.READ_FAILED, "a.md")).resolves.toBe(42);
  });

  it("wraps failures with the code and path", async () => {
    const cause = new Error("disk full");
    const error = await withErrorContext(
      async () => {
        throw cause;
      },
      ToolErrorCode.WRITE_FAILED,
      "out/a.md",
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolError);
    if (!(error instanceof ToolError)) return;
    expect(error.message).toBe("Cannot write out/a.md: disk full");
    expect(error.cause).toBe(cause);
    expect(error.toJSON()).toEqual({
      name: "ToolError",
      message: "Cannot write out/a.md: disk full",
      code: "WRITE_FAILED",
      path: "out/a.md",
    });
  });

  it("passes tool errors through unchanged", async () => {
    const original = new ToolError("Not a directory: x", ToolErrorCode.INVALID_PATH, "x");
    await expect(
      withErrorContext(
        async () => {
          throw original;
        },
        ToolErrorCode.READ_FAILED,
        "y",
      ),
    ).rejects.toBe(original);
  });
});
