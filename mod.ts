// quire library entry point
// Import this for library usage: import { ... } from 'quire'

// Value parsers
export * from './src/units.ts';
export * from './src/color.ts';

// Attributes and content
export * from './src/attributes.ts';

// Element tree and registry
export * from './src/element.ts';
export * from './src/document.ts';

// Events
export * from './src/events.ts';

// Factories
export * from './src/element-factory.ts';
export * from './src/attribute-factory.ts';

// Markup parser
export * from './src/markup/mod.ts';

// Text rendering
export * from './src/render.ts';

// Errors
export * from './src/errors.ts';

// Logging
export * from './src/logging.ts';

// Configuration
export * from './src/config/mod.ts';

// Command line
export { runCli, usage, VERSION, type CliIO } from './src/cli.ts';
