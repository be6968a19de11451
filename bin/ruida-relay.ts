#!/usr/bin/env node
import {runRelay} from '../src/cli/relay';
import {describeError} from '../src/cli/send';

runRelay(process.argv.slice(2), process.env).then((code) => {
    process.exitCode = code;
}, (err: unknown) => {
    console.error(describeError(err));
    process.exitCode = 1;
});
