export * from './TemplateSchema.js';
export * from './TemplateCatalog.js';
export * from './TemplateLoader.js';
export * from './Synthesis.js';
export * from './ReportRenderer.js';
export * from './ReportStore.js';
export * from './WorkflowCoordinator.js';
