import { createProgram } from "./src/cli.ts";

createProgram().parse(process.argv);
