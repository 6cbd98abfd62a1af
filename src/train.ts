// Wellness Retention Engine - Training CLI
//
//   tsx src/train.ts --data data/training/sample_users.json [--models-dir ml_models]
//                    [--clusters 4] [--seed 42]

import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { ModelLoader } from "./model-loader.js";
import {
  parseIntegerOption,
  parseTrainingRecords,
  trainChurnModel,
  trainClusteringModel,
  writeArtifacts,
} from "./trainer.js";
import { createConsoleLogger, describeError } from "./utils.js";

const logger = createConsoleLogger("Train");

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      data: { type: "string" },
      "models-dir": { type: "string", default: "ml_models" },
      clusters: { type: "string", default: "4" },
      seed: { type: "string", default: "42" },
    },
  });

  if (!values.data) {
    throw new Error("--data <file> is required");
  }

  const records = parseTrainingRecords(JSON.parse(await readFile(values.data, "utf-8")));
  logger.info(`Loaded ${records.length} training records from ${values.data}`);

  const clustering = trainClusteringModel(records, {
    k: parseIntegerOption(values.clusters, "--clusters", 1),
    seed: parseIntegerOption(values.seed, "--seed", 0),
  });
  logger.info(`Clustering: inertia ${clustering.model.inertia?.toFixed(3)}, sizes [${clustering.clusterSizes.join(", ")}]`);

  const churn = trainChurnModel(records);
  logger.info(`Churn model: training accuracy ${churn.trainingAccuracy}`);

  await writeArtifacts(new ModelLoader(values["models-dir"], logger), clustering, churn, logger);
  logger.info(`Artifacts written to ${values["models-dir"]}/`);
}

main().catch((err: unknown) => {
  logger.error(describeError(err));
  process.exit(1);
});
