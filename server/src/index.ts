import { buildApp } from "./app.js";
import { AppController } from "./services/appController.js";
import { MupdfRasterizer } from "./services/mupdfRasterizer.js";
import { config, visionModel } from "./services/openaiClient.js";
import { PageExtractor } from "./services/pageExtractor.js";
import { TutorClient } from "./services/tutorClient.js";

const controller = new AppController({
  extractor: new PageExtractor(new MupdfRasterizer(), config.pdfRenderDpi),
  tutor: new TutorClient(visionModel)
});

const app = await buildApp({
  controller,
  corsOrigins: config.corsOrigins,
  maxUploadBytes: config.maxUploadBytes
});

try {
  await app.listen({
    host: config.host,
    port: config.port
  });

  app.log.info(`Study server ready at http://${config.host}:${config.port}`);
} catch (error) {
  app.log.error(error);
  process.exit(1);
}
