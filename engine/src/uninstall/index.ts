export { removeIntegration } from "./integration";
export { removeDependencies, stripNixLines } from "./dependencies";
