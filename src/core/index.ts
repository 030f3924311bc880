export * from './DiagnosticClient';
export * from './report';
