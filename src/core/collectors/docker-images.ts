import { rm } from "node:fs/promises";
import * as path from "node:path";
import type { ContainerEngine } from "../../system/capabilities";
import type { CollectorOutput } from "../../types";
import { BaseCollector } from "./base";
import type { CollectorContext } from "./types";

export const IMAGES_ARCHIVE = "docker_images.tar.gz";

export class DockerImagesCollector extends BaseCollector {
  readonly name = "docker-images";
  readonly phase = "docker";
  readonly category = "docker";
  readonly area = "docker";
  readonly spacePhase = "docker_images";

  constructor(
    private readonly engine: ContainerEngine,
    private readonly gzipLevel: number,
  ) {
    super();
  }

  isApplicable(): Promise<boolean> {
    return this.engine.isAvailable();
  }

  async produce(context: CollectorContext): Promise<CollectorOutput> {
    const imageIds = await this.engine.listImageIds().catch((error: unknown) => {
      throw this.fail("Could not list images", error);
    });

    if (imageIds.length === 0) {
      this.log.info("No images to save");
      return { artifacts: [], omissions: [] };
    }

    this.log.info(`Saving ${imageIds.length} Docker image(s)...`);
    const file = path.join(context.outputDir, IMAGES_ARCHIVE);
    const result = await this.engine.saveImages(imageIds, file, this.gzipLevel);

    if (!result.success) {
      await rm(file, { force: true });
      throw this.fail(`Could not back up Docker images: ${result.stderr || `exit ${result.exitCode}`}`);
    }

    return {
      artifacts: [
        { ...(await this.staged(context, file)), kind: "image-bundle", imageCount: imageIds.length },
      ],
      omissions: [],
    };
  }
}
