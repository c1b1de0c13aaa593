export { app } from "./index";
