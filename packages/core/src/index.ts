/**
 * @kinetica/core: declarative, frame-stepped actions for positioned entities.
 *
 * Framework-agnostic. Runs in browser and Node.js environments; the host
 * owns the frame loop and position integration.
 */

export * from "./actions/index.js";
