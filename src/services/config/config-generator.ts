/**
 * Writes the initial config.yaml for the installed application.
 *
 * The file is rendered from `resources/config.yaml.template`. An existing
 * config.yaml is never overwritten; the new file is written beside it as
 * config.yaml.new.
 */

import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { FileSystemLayer } from "../platform/filesystem.js";
import { pathExists } from "../platform/filesystem.js";
import type { PathProvider } from "../platform/path-provider.js";
import type { Logger } from "../logging/index.js";
import { GGUF_MODEL_NAME } from "../model-download/model-download-service.js";

/**
 * Location of the shipped template, resolved from this module.
 */
export const CONFIG_TEMPLATE_PATH = fileURLToPath(
  new URL("../../../resources/config.yaml.template", import.meta.url)
);

export const CONFIG_FILE_NAME = "config.yaml";

export interface ConfigTemplateValues {
  readonly generatedAt: string;
  readonly knowledgeBase: string;
  readonly dbPath: string;
  readonly modelPath: string;
  readonly dataDir: string;
}

/**
 * Replace `{{name}}` placeholders. Unknown placeholders are left as they are.
 *
 * @example
 * renderTemplate('db-path: "{{dbPath}}"', values); // 'db-path: "surrealkv:///data/remembrances.db"'
 */
export function renderTemplate(template: string, values: ConfigTemplateValues): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) => {
    for (const [key, value] of Object.entries(values)) {
      if (key === name) return value;
    }
    return placeholder;
  });
}

export interface GeneratedConfig {
  /** File that was written */
  readonly path: string;
  /** Existing config.yaml that was left untouched, if any */
  readonly existingPath: string | null;
  readonly knowledgeBaseDir: string;
}

/**
 * Dependencies for ConfigGenerator.
 */
export interface ConfigGeneratorDeps {
  readonly fileSystem: FileSystemLayer;
  readonly pathProvider: PathProvider;
  readonly logger: Logger;
  /** Defaults to {@link CONFIG_TEMPLATE_PATH} */
  readonly templatePath?: string;
  /** Clock for the "Generated on" header */
  readonly now?: () => Date;
}

export class ConfigGenerator {
  private readonly fileSystem: FileSystemLayer;
  private readonly pathProvider: PathProvider;
  private readonly logger: Logger;
  private readonly templatePath: string;
  private readonly now: () => Date;

  constructor(deps: ConfigGeneratorDeps) {
    this.fileSystem = deps.fileSystem;
    this.pathProvider = deps.pathProvider;
    this.logger = deps.logger;
    this.templatePath = deps.templatePath ?? CONFIG_TEMPLATE_PATH;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Values substituted into the template for this install layout.
   */
  templateValues(): ConfigTemplateValues {
    const { dataDir, modelsDir } = this.pathProvider;
    return {
      generatedAt: this.now().toISOString(),
      knowledgeBase: join(dataDir, "knowledge-base"),
      dbPath: `surrealkv://${join(dataDir, "remembrances.db")}`,
      modelPath: join(modelsDir, GGUF_MODEL_NAME),
      dataDir,
    };
  }

  /**
   * Create the knowledge-base directory and write the config file.
   */
  async generate(): Promise<GeneratedConfig> {
    const values = this.templateValues();
    await this.fileSystem.mkdir(values.knowledgeBase);

    const configPath = join(this.pathProvider.configDir, CONFIG_FILE_NAME);
    const exists = await pathExists(this.fileSystem, configPath);
    const path = exists ? `${configPath}.new` : configPath;

    const template = await this.fileSystem.readFile(this.templatePath);
    await this.fileSystem.mkdir(this.pathProvider.configDir);
    await this.fileSystem.writeFile(path, renderTemplate(template, values));

    this.logger.info("Config written", { path, existing: exists });
    return {
      path,
      existingPath: exists ? configPath : null,
      knowledgeBaseDir: values.knowledgeBase,
    };
  }
}
