export { app } from "../hello";
