afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
});
