// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';
import * as chai from 'chai';
import sinonChai from 'sinon-chai';

chai.use(sinonChai);
