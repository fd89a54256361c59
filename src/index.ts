#!/usr/bin/env node
import process from "node:process";
import { main } from "./cli.js";

await main(process.argv, process.env);
