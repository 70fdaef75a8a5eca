import { buildServer } from "./server.js";

const port = Number(process.env.PORT || 0) || 4201;

buildServer()
  .then(async (app) => {
    await app.listen({ port, host: "0.0.0.0" });
    app.log.info("expense-tracker listening on :" + port);
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
