/**
 * Resource collector contract
 */

import type {
  ArtifactCategory,
  CollectorOutput,
  PhaseName,
  SpacePhase,
} from "../../types";
import type { PermissionLedger } from "../ledger/permission-ledger";

export interface CollectorContext {
  stagingPath: string;
  /** Absolute path of the collector's own area; created before produce() runs */
  outputDir: string;
  ledger: PermissionLedger;
  /** Mode applied to paths that must become readable */
  readMode: string;
}

export interface ResourceCollector {
  readonly name: string;
  readonly phase: PhaseName;
  readonly category: ArtifactCategory;
  /** Staging sub-directory this collector writes into, relative to the staging root */
  readonly area: string;
  /** Estimate the space guard evaluates before this collector runs */
  readonly spacePhase: SpacePhase;
  /** Paths loosened to the read mode before the space check */
  readonly permissions?: readonly string[];
  /** False when what this collector captures is not present on the host */
  isApplicable?(): Promise<boolean>;
  /** Throws CollectorError when nothing useful could be captured */
  produce(context: CollectorContext): Promise<CollectorOutput>;
}
