import { buildApp } from "./app";

const app = buildApp();

async function main() {
  const port = Number(process.env.PORT ?? 3333) || 3333;
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen({ port, host });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
