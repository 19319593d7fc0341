#!/usr/bin/env node
import Logger from "./core/Logger";
import Worker from "./core/Worker";
import OssError from "./struct/OssError";

const main = async (): Promise<void> => {
  const worker = new Worker();
  await worker.run();
};

main()
  .then(() => process.exit(0))
  .catch((e: unknown) => {
    const error = e instanceof OssError ? e : new OssError("MESSAGE_GENERATION_FAILED", e);
    Logger.generateErrorLog(error);
    console.error(error.message);
    process.exit(1);
  });
