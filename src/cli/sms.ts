import { runSmsCli } from "@/lib/sms/cli";

runSmsCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[sms] crashed", error);
    process.exitCode = 1;
  });
