#!/usr/bin/env node
import React from 'react';
import {render} from 'ink';
import App from './ui/App.js';

const initialTask = process.argv.slice(2).join(' ').trim();

const {unmount} = render(<App initialTask={initialTask || undefined} />);

const handleExit = () => {
  unmount();
  process.exit(0);
};

process.on('SIGINT', handleExit);
process.on('SIGTERM', handleExit);
