process.env.LOG_LEVEL = "silent";
delete process.env.EXTRACT_API_KEY;
delete process.env.EXTRACT_BASE_URL;
delete process.env.EXTRACT_MODEL_ID;
