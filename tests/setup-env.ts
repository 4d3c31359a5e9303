export {};

process.env.OPENAI_API_KEY ??= "test-openai-key";
process.env.LOG_LEVEL ??= "silent";
