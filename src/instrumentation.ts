export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") return;

  const { getSurveyContext } = await import("@/lib/context");
  const { config } = await getSurveyContext();
  console.info("[survey] server_ready", {
    survey: `http://localhost:${config.port}/survey.html`,
    dataDir: config.dataDir,
  });
}
