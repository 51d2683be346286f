import { Test, TestingModule } from "@nestjs/testing";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import * as path from "path";
import { AppModule } from "../../src/app.module";
import { ExportConfig, exportConfig } from "../../src/config/export.config";

/**
 * Creates the full application context with export settings overridden.
 * Use this for E2E tests that run a whole export.
 *
 * @param config - Settings replacing the environment-based export config
 * @returns Initialized testing module
 */
export async function createTestContext(config: ExportConfig): Promise<TestingModule> {
  const moduleFixture: TestingModule = await Test.createTestingModule({
    imports: [AppModule],
  })
    .overrideProvider(exportConfig.KEY)
    .useValue(config)
    .compile();

  await moduleFixture.init();
  return moduleFixture;
}

/**
 * Fresh, empty output directory under the OS temp dir
 */
export function createOutputDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), "holiday-export-e2e-"));
}

/**
 * Cleanup helper to close the context and remove the output directory
 */
export async function closeTestContext(
  context: TestingModule | undefined,
  outputDir: string | undefined,
): Promise<void> {
  if (context) {
    await context.close();
  }
  if (outputDir) {
    await rm(outputDir, { recursive: true, force: true });
  }
}
