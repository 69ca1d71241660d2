// Los tests nunca tocan servicios reales: sin DB, sin proveedor, sin token.
delete process.env.SUPABASE_URL;
delete process.env.SUPABASE_SERVICE_ROLE_KEY;
delete process.env.OPENAI_API_KEY;
delete process.env.API_TOKEN;
process.env.LOG_LEVEL = "silent";
