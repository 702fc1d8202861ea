// Ambiente de teste: sem arquivos de log, logger silencioso
process.env.NODE_ENV = 'test';
delete process.env.LOG_LEVEL;
