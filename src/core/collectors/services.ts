import { writeFile } from "node:fs/promises";
import * as path from "node:path";
import type { ServiceManager, ServiceUnit, UnitListing } from "../../system/capabilities";
import type { Artifact, CollectorOutput, Omission } from "../../types";
import { BaseCollector } from "./base";
import type { CollectorContext } from "./types";

const LISTINGS: UnitListing[] = ["active", "enabled", "failed"];

export function renderUnits(units: ServiceUnit[]): string {
  return units.map((u) => [u.unit, u.state, u.description].join("\t").trimEnd()).join("\n") + "\n";
}

export class ServicesCollector extends BaseCollector {
  readonly name = "services";
  readonly phase = "services";
  readonly category = "services";
  readonly area = "services";
  readonly spacePhase = "services";

  constructor(private readonly services: ServiceManager) {
    super();
  }

  async produce(context: CollectorContext): Promise<CollectorOutput> {
    this.log.info("Collecting services information...");
    const artifacts: Artifact[] = [];
    const omissions: Omission[] = [];

    for (const listing of LISTINGS) {
      try {
        const units = await this.services.listUnits(listing);
        const file = path.join(context.outputDir, `${listing}_services.txt`);
        await writeFile(file, renderUnits(units));
        artifacts.push({ ...(await this.staged(context, file)), kind: "report" });
      } catch (error) {
        omissions.push(this.omission(error, `${listing} services`));
      }
    }

    if (artifacts.length === 0) {
      throw this.fail("Service manager did not answer", omissions[0]?.reason);
    }

    return { artifacts, omissions };
  }
}
