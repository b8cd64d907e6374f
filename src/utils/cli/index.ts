export { enhanceHelp } from "./help";
