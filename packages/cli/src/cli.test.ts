import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import { createTemplateSet, type TemplateKey } from "md2wechat-converter";
import { createLogger, type FetchLike } from "md2wechat-submission";
import { Response } from "undici";
import { afterAll, beforeAll, describe, expect, test, vi } from "vitest";
import { defaultOutputPath, runCli, type CliIo } from "./cli";

const testWorkspace = join(tmpdir(), `md2wechat-cli-${randomUUID()}`);
const templatesDir = join(testWorkspace, "templates");

const templateTexts: Record<TemplateKey, string> = {
    contentBlock: "<S>{content}</S>",
    blankLine: "<BL/>",
    divider: "<HR/>",
    heading1: "<H1>Part.{index} {title}</H1>",
    heading2: "<H2>{title}</H2>",
    quote: "<Q>{content}</Q>",
    text: "<T>{content}</T>",
    image: "<IMG/>",
    bannerTop: "<TOP/>",
    bannerBottom: "<BOTTOM/>",
    terminator: "<END/>",
};

function captureIo(): CliIo & { out: string[]; err: string[] } {
    const out: string[] = [];
    const err: string[] = [];
    return { out, err, stdout: (line) => out.push(line), stderr: (line) => err.push(line) };
}

const silent = createLogger("error", () => undefined);

beforeAll(() => {
    rmSync(testWorkspace, { recursive: true, force: true });
    mkdirSync(templatesDir, { recursive: true });
    for (const template of Object.values(createTemplateSet(templateTexts))) {
        writeFileSync(join(templatesDir, template.name), template.text, "utf8");
    }
});

afterAll(() => {
    rmSync(testWorkspace, { recursive: true, force: true });
});

function writeMarkdown(name: string, content: string): string {
    const path = join(testWorkspace, name);
    writeFileSync(path, content, "utf8");
    return path;
}

describe("runCli convert", () => {
    test("writes html beside the input by default", async () => {
        const input = writeMarkdown("post.md", "# Title\n\nHello");
        const io = captureIo();

        const code = await runCli([input, "-t", templatesDir], io);

        const output = join(testWorkspace, "post.html");
        expect(code).toBe(0);
        expect(io.out).toEqual([output]);
        expect(readFileSync(output, "utf8")).toBe(
            "<S><TOP/><H1>Part.01 Title</H1><BL/></S><S><T>Hello</T><BOTTOM/></S><END/>",
        );
    });

    test("honours --output and the templates directory from the environment", async () => {
        const input = writeMarkdown("env.md", "---");
        const output = join(testWorkspace, "custom.html");
        const io = captureIo();

        const code = await runCli(["convert", input, "--output", output], io, {
            env: { MD2WECHAT_TEMPLATES_DIR: templatesDir },
        });

        expect(code).toBe(0);
        expect(readFileSync(output, "utf8")).toBe("<HR/><END/>");
    });

    test("prints the trace with --debug", async () => {
        const input = writeMarkdown("trace.md", "A");
        const io = captureIo();

        await runCli([input, "-t", templatesDir, "--debug"], io);

        expect(io.err).toEqual([
            "[debug] afterBlockPhase: 0 fragment(s)",
            "[debug]   Lines 0-0: paragraph, inSection=false",
            "[debug]   Opened section 1",
            "[debug] assembled: 2 fragment(s)",
            "[debug]   Sealed section 1 with 3 fragments",
        ]);
    });

    test("exits with 1 when the input is missing", async () => {
        const io = captureIo();
        const missing = join(testWorkspace, "missing.md");
        expect(await runCli([missing], io)).toBe(1);
        expect(io.err).toEqual([`Error: Input file not found: ${missing}`]);
    });

    test("exits with 1 when the template directory is missing", async () => {
        const input = writeMarkdown("no-templates.md", "A");
        const io = captureIo();
        const missingDir = join(testWorkspace, "nowhere");
        expect(await runCli([input, "-t", missingDir], io)).toBe(1);
        expect(io.err).toEqual([`Error: Template directory not found: ${missingDir}`]);
        expect(existsSync(join(testWorkspace, "no-templates.html"))).toBe(false);
    });

    test("exits with 2 on a usage error", async () => {
        const io = captureIo();
        expect(await runCli(["--bogus"], io)).toBe(2);
        expect(io.err[0]).toBe("Error: Unknown flag: --bogus");
        expect(io.err[1].startsWith("Usage:")).toBe(true);
    });

    test("prints usage for --help", async () => {
        const io = captureIo();
        expect(await runCli(["--help"], io)).toBe(0);
        expect(io.out[0].split("\n")[0]).toBe("Usage:");
    });
});

describe("runCli submit", () => {
    const baseArgs = ["--email", "writer@mail.test", "--wechat", "wx-writer"];

    test("builds the payload without sending on --dry-run", async () => {
        const input = writeMarkdown("dry.md", "Hello");
        const io = captureIo();
        const fetchStub = vi.fn<FetchLike>();

        const code = await runCli(["submit", input, ...baseArgs, "--dry-run"], io, {
            env: { MD2WECHAT_WORK_DIR: join(testWorkspace, "work"), MD2WECHAT_TEMPLATES_DIR: templatesDir },
            fetch: fetchStub,
            logger: silent,
        });

        expect(code).toBe(0);
        expect(fetchStub).not.toHaveBeenCalled();
        expect(io.out).toHaveLength(2);
        expect(io.out[0].startsWith("Converted 1 file(s) into ")).toBe(true);
        expect(io.out[1].endsWith("payload.zip")).toBe(true);
    });

    test("posts to the remote and reports the stored folder", async () => {
        const input = writeMarkdown("send.md", "Hello");
        const io = captureIo();
        const fetchStub = vi.fn<FetchLike>(async () => new Response(JSON.stringify({ folder: "stored-9" }), { status: 200 }));

        const code = await runCli(["submit", input, ...baseArgs], io, {
            env: {
                MD2WECHAT_REMOTE_BASE_URL: "https://remote.test",
                MD2WECHAT_REMOTE_TOKEN: "test-token",
                MD2WECHAT_WORK_DIR: join(testWorkspace, "work"),
                MD2WECHAT_TEMPLATES_DIR: templatesDir,
            },
            fetch: fetchStub,
            logger: silent,
        });

        expect(code).toBe(0);
        expect(fetchStub).toHaveBeenCalledTimes(1);
        expect(fetchStub.mock.calls[0][0]).toBe("https://remote.test/api/submissions");
        expect(io.out[io.out.length - 1]).toBe("Stored remotely as stored-9");
    });

    test("fails when no remote is configured", async () => {
        const input = writeMarkdown("nowhere.md", "Hello");
        const io = captureIo();

        const code = await runCli(["submit", input, ...baseArgs], io, {
            env: { MD2WECHAT_WORK_DIR: join(testWorkspace, "work"), MD2WECHAT_TEMPLATES_DIR: templatesDir },
            logger: silent,
        });

        expect(code).toBe(1);
        expect(io.err).toEqual(["Error: MD2WECHAT_REMOTE_BASE_URL is not set"]);
    });
});

describe("defaultOutputPath", () => {
    test("swaps the extension for .html", () => {
        expect(defaultOutputPath(join("notes", "a.b.md"))).toBe(join("notes", "a.b.html"));
        expect(defaultOutputPath("README")).toBe("README.html");
    });
});
