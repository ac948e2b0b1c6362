// Keep tests hermetic: provider keys from the host shell must not leak in.
for (const key of ['ANTHROPIC_API_KEY', 'OPENAI_API_KEY', 'OPENAI_COMPATIBLE_API_KEY']) {
  delete process.env[key];
}
