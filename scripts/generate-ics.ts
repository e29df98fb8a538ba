import { main } from "@/lib/main";
import { errorMessage } from "@/lib/errors";

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error("[scrape] failed:", errorMessage(e));
    process.exitCode = 1;
  }
);
