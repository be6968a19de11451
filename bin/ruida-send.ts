#!/usr/bin/env node
import {describeError, runSend} from '../src/cli/send';

runSend(process.argv.slice(2), process.env).then((code) => {
    process.exitCode = code;
}, (err: unknown) => {
    console.error(describeError(err));
    process.exitCode = 1;
});
