const timestamp = () => `(${new Date().toISOString()})`;

export const customLogger = (message: string, ...rest: unknown[]) => {
    console.log(timestamp(), message, ...rest);
};

export const warnLogger = (message: string, ...rest: unknown[]) => {
    console.warn(timestamp(), message, ...rest);
};

export const errorLogger = (message: string, ...rest: unknown[]) => {
    console.error(timestamp(), message, ...rest);
};
