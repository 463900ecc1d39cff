// src/tools/index.ts
// This file imports all tool modules to ensure their registration logic runs.

import './project-planner/index.js';
import './phase-state-manager/index.js';
import './workflow-catalog/index.js';

import logger from '../logger.js';
logger.debug('All tool modules imported for registration.');
