import { createCli } from './index';

createCli()
    .execute()
    .then(
        (exitCode) => {
            process.exitCode = exitCode;
        },
        (error: unknown) => {
            console.error(error);
            process.exitCode = 1;
        },
    );
