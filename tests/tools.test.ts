import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import type { FlowgenConfig } from "../src/config.js";
import { registerGenerateTools } from "../src/tools/generate.js";
import { registerAddressTools } from "../src/tools/addresses.js";
import { registerOutputTools } from "../src/tools/output.js";
import { registerResources } from "../src/resources.js";
import { registerPrompts } from "../src/prompts.js";
import { HEADER_LINE, NOISE_DIR, SAMPLE_LINE, SMALL_TOPOLOGY_PATH } from "./fixtures.js";

const testConfig: FlowgenConfig = {
  topologyPath: SMALL_TOPOLOGY_PATH,
  parseErrors: "abort",
  maxResults: 5,
};

interface ToolText {
  isError: boolean;
  text: string;
}

describe("MCP tools", () => {
  const client = new Client({ name: "flowgen-test-client", version: "1.0.0" });
  let tmpDir: string;

  beforeAll(async () => {
    const server = new McpServer({ name: "ddos-flowgen-mcp", version: "1.0.0" });
    registerGenerateTools(server, testConfig);
    registerAddressTools(server, testConfig);
    registerOutputTools(server, testConfig);
    registerResources(server, testConfig);
    registerPrompts(server);

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "flowgen-tools-"));
  });

  afterAll(async () => {
    await client.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  async function call(name: string, args: Record<string, unknown> = {}): Promise<ToolText> {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const first = result.content[0];
    if (first?.type !== "text") {
      throw new Error(`${name} returned no text content`);
    }
    return { isError: result.isError ?? false, text: first.text };
  }

  async function callJson(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
    const { isError, text } = await call(name, args);
    if (isError) {
      throw new Error(text);
    }
    return JSON.parse(text);
  }

  it("should register every tool", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "flowgen_anonymize_address",
      "flowgen_attacker_addresses",
      "flowgen_generate",
      "flowgen_preview",
      "flowgen_summarize_output",
      "flowgen_validate_topology",
    ]);
  });

  it("should list attacker labels", async () => {
    expect(await callJson("flowgen_attacker_addresses")).toEqual({
      victim: { vantagePoint: "V", address: "172.21.99.99" },
      vantagePoints: [
        { name: "A", prefix: "172.16", amplifiers: ["172.16.10.13"], bots: ["172.16.224.103", "172.16.97.67"] },
        { name: "B", prefix: "172.17", amplifiers: [], bots: ["172.17.202.32", "172.17.86.53"] },
        { name: "V", prefix: "172.21", amplifiers: [], bots: [] },
      ],
    });
  });

  it("should anonymize an address per vantage point", async () => {
    expect(
      await callJson("flowgen_anonymize_address", { address: "10.1.1.5", side: "external" }),
    ).toEqual({
      address: "10.1.1.5",
      side: "external",
      rewritten: [
        { vantagePoint: "A", address: "30.192.53.249" },
        { vantagePoint: "B", address: "175.15.253.58" },
        { vantagePoint: "V", address: "234.56.119.13" },
      ],
    });

    expect(
      await callJson("flowgen_anonymize_address", {
        address: "93.184.216.34",
        side: "internal",
        vantagePoint: "B",
      }),
    ).toMatchObject({ rewritten: [{ vantagePoint: "B", address: "172.17.164.108" }] });
  });

  it("should validate topologies", async () => {
    expect(await callJson("flowgen_validate_topology")).toMatchObject({
      valid: true,
      victim: { vantagePoint: "V", address: "172.21.99.99" },
      syntheticInterval: 5,
      probesEnabled: true,
    });

    const missing = await call("flowgen_validate_topology", { topologyPath: "/nonexistent.json" });
    expect(missing.isError).toBe(true);
    expect(missing.text).toBe(
      'Invalid topology: Cannot read topology "/nonexistent.json": ' +
        "ENOENT: no such file or directory, open '/nonexistent.json'",
    );
  });

  it("should preview lines without touching the filesystem", async () => {
    const preview = await callJson("flowgen_preview", {
      lines: [HEADER_LINE, SAMPLE_LINE, "junk"],
      direction: "inbound",
      parseErrors: "skip",
    });

    expect(preview).toMatchObject({
      stats: { direction: "inbound", linesRead: 3, headerLines: 1, skippedLines: 1, triggers: 0, realFlows: 3 },
      messages: [
        "Processing inbound...",
        "Skipping inbound line 3: expected 12 fields, found 1",
        "inbound: 3 lines, 0 triggers, 3 real flows, synthetic amplifier=0 bot=0 victim=0 probe=0, 1 skipped",
      ],
      outputs: {
        V: { outbound: [] },
      },
    });
    expect(preview).toHaveProperty(["outputs", "A", "inbound", 0], HEADER_LINE);
    expect(preview).toHaveProperty(
      ["outputs", "A", "inbound", 1],
      "                          30.192.53.249|                         172.16.164.108| 1234|   80|  6|         3|       180| S      |2024/01/01T00:00:00.000|    0.010|2024/01/01T00:00:00.010| S0|",
    );
  });

  it("should follow the configured parse error policy when previewing", async () => {
    const result = await call("flowgen_preview", {
      lines: [HEADER_LINE, SAMPLE_LINE, "junk"],
      direction: "inbound",
    });
    expect(result.isError).toBe(true);
    expect(result.text).toContain("line 3: expected 12 fields, found 1");
  });

  it("should require a dataset directory to generate", async () => {
    const result = await call("flowgen_generate", { outputDir: path.join(tmpDir, "unused") });
    expect(result.isError).toBe(true);
    expect(result.text).toContain("Error generating dataset: A dataset directory is required");
  });

  it("should generate and summarize a dataset", async () => {
    const outputDir = path.join(tmpDir, "generated");

    const generated = await callJson("flowgen_generate", { datasetDir: NOISE_DIR, outputDir });
    expect(generated).toMatchObject({ outputDir });
    expect(fs.readdirSync(outputDir).sort()).toEqual([
      "A-inbound.tuc",
      "A-outbound.tuc",
      "B-inbound.tuc",
      "B-outbound.tuc",
      "V-inbound.tuc",
      "V-outbound.tuc",
    ]);

    const summary = await callJson("flowgen_summarize_output", { outputDir });
    expect(summary).toHaveProperty(["files", "length"], 6);
    expect(summary).toHaveProperty(["files", 1, "labeled"], { amplifier: 1, bot: 2, victim: 3, probe: 0 });

    const again = await call("flowgen_generate", { datasetDir: NOISE_DIR, outputDir });
    expect(again.isError).toBe(true);
    expect(again.text).toContain("already exists");
  });
});

describe("MCP resources and prompts", () => {
  const client = new Client({ name: "flowgen-test-client", version: "1.0.0" });

  beforeAll(async () => {
    const server = new McpServer({ name: "ddos-flowgen-mcp", version: "1.0.0" });
    registerResources(server, testConfig);
    registerPrompts(server);

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await client.close();
  });

  it("should describe the record format", async () => {
    const { contents } = await client.readResource({ uri: "flowgen://record-format" });
    const first = contents[0];
    expect(first).toHaveProperty("text");
    const format: unknown = "text" in first ? JSON.parse(String(first.text)) : null;

    expect(format).toMatchObject({ delimiter: "|", trailingDelimiter: true });
    expect(format).toHaveProperty(["fields", "length"], 12);
    expect(format).toHaveProperty(["fields", 0], {
      name: "srcAddr",
      column: "sIP",
      width: 39,
      description: expect.any(String),
    });
    expect(format).toHaveProperty(["fields", 7, "width"], "unpadded");
  });

  it("should serve the configured topology", async () => {
    const { contents } = await client.readResource({ uri: "flowgen://topology" });
    const first = contents[0];
    const body: unknown = "text" in first ? JSON.parse(String(first.text)) : null;
    expect(body).toMatchObject({ path: SMALL_TOPOLOGY_PATH, topology: { botsPerNode: 2 } });
  });

  it("should offer the dataset prompts", async () => {
    const { prompts } = await client.listPrompts();
    expect(prompts.map((prompt) => prompt.name).sort()).toEqual(["plan-scenario", "review-dataset"]);

    const review = await client.getPrompt({ name: "review-dataset", arguments: { outputDir: "/data/out" } });
    expect(review.messages[0].content).toMatchObject({ type: "text" });
    expect(JSON.stringify(review.messages[0].content)).toContain("Review the generated flow dataset in /data/out.");
  });
});
