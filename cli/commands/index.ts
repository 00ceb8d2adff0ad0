import type { Command } from 'commander';
import { registerBigCommerceCommands } from './big-commerce.js';
import { registerBlinkfireCommands } from './blinkfire.js';
import { registerBumpCommands } from './bump.js';
import { registerCheqCommands } from './cheq.js';
import { registerFormstackCommands } from './formstack.js';
import { registerFortressCommands } from './fortress.js';
import { registerGamedayCommands } from './gameday.js';
import { registerGeminiCommands } from './gemini.js';
import { registerGreenhouseCommands } from './greenhouse.js';
import { registerMailchimpCommands } from './mailchimp.js';
import { registerMetaCommands } from './meta.js';
import { registerNhlCommands } from './nhl.js';
import { registerParkHubCommands } from './park-hub.js';
import { registerSeatGeekCommands } from './seatgeek.js';
import { registerTradableBitsCommands } from './tradable-bits.js';
import { registerYellowDogCommands } from './yellow-dog.js';
import { registerConfigCommand } from './config.js';
import { registerCheckpointCommand } from './checkpoint.js';

export function registerCommands(program: Command): void {
  registerBigCommerceCommands(program);
  registerBlinkfireCommands(program);
  registerBumpCommands(program);
  registerCheqCommands(program);
  registerFormstackCommands(program);
  registerFortressCommands(program);
  registerGamedayCommands(program);
  registerGeminiCommands(program);
  registerGreenhouseCommands(program);
  registerMailchimpCommands(program);
  registerMetaCommands(program);
  registerNhlCommands(program);
  registerParkHubCommands(program);
  registerSeatGeekCommands(program);
  registerTradableBitsCommands(program);
  registerYellowDogCommands(program);
  registerConfigCommand(program);
  registerCheckpointCommand(program);
}
