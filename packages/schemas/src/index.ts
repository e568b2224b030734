export * from "./item.js";
export * from "./pagination.js";
export * from "./problems.js";
