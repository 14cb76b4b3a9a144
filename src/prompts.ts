import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

export function registerPrompts(server: McpServer): void {
  server.prompt(
    "review-dataset",
    "Check a generated DDoS dataset for plausibility and label coverage before it is used to train or evaluate a detector.",
    {
      outputDir: z.string().describe("Generated output directory"),
      topologyPath: z.string().optional().describe("Topology file the dataset was generated with"),
    },
    ({ outputDir, topologyPath }) => ({
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: `Review the generated flow dataset in ${outputDir}${topologyPath ? ` (topology: ${topologyPath})` : ""}.

1. **Topology**: Run flowgen_validate_topology and note the victim and which vantage points host amplifiers or bots
2. **Labels**: Run flowgen_attacker_addresses to get the ground-truth amplifier, bot and victim addresses
3. **Per-file summary**: Run flowgen_summarize_output
   - Every vantage point should have inbound and outbound flows
   - Amplifier vantage points: inbound queries from the victim, outbound responses far larger in bytes
   - Bot vantage points: outbound UDP floods to the victim, nothing bot-related inbound
   - Victim: inbound amplifier and bot flows from every attacking vantage point
   - Probes: SYN-only TCP flows, inbound only
4. **Detectability**: Compare source-address entropy between the victim's inbound file and the others
5. **Report**: List any vantage point whose label counts are zero where attacks were configured, and state whether the attack-to-noise ratio looks usable`,
          },
        },
      ],
    }),
  );

  server.prompt(
    "plan-scenario",
    "Design a topology for a new DDoS scenario and dry-run it on sample noise lines.",
    {
      goal: z.string().describe("What the scenario should exercise, e.g. 'reflection-heavy attack seen from 4 networks'"),
    },
    ({ goal }) => ({
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: `Plan a DDoS dataset scenario: ${goal}

1. **Start from the current topology**: Read the flowgen://topology resource
2. **Draft the vantage points**: One unique name and two-octet prefix each; exactly one victim, which hosts no amplifiers or bots
3. **Pick the density**: syntheticInterval controls how many noise lines pass between attack bursts (0 is the densest)
4. **Dry run**: Use flowgen_preview with a handful of noise lines in each direction and check the synthetic flows per vantage point
5. **Validate**: Write the topology file and run flowgen_validate_topology on it
6. **Hand over**: Give the topology JSON and the flowgen_generate call to run`,
          },
        },
      ],
    }),
  );
}
