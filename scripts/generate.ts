import { runGenerate } from "@/lib/generate";

process.exitCode = runGenerate(process.argv.slice(2));
