export interface CliContextState {
    configProfile?: string;
    verbose: boolean;
    headless?: boolean;
}

const state: CliContextState = {
    verbose: false,
};

export const cliContext = {
    get: () => state,
    set: (newState: Partial<CliContextState>) => {
        Object.assign(state, newState);
    }
};
