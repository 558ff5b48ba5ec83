export * from "./instance-records.js";
