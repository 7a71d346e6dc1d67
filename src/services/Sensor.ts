import DEBUG from 'debug'
import { concat, EMPTY, merge, Observable, of } from 'rxjs'
import { distinctUntilChanged, shareReplay, switchMap } from 'rxjs/operators'
import type { EntityAttributes } from '../types'
import type { EntityServices } from './BinarySensor'
import Discovery, { DiscoveryDevice } from './Discovery'
import Mqtt from './Mqtt'
const debug = DEBUG('ev-tracker.sensor')

export type SensorValue = number | string

export type SensorOptions = {
    name?: string
    unit?: string
    deviceClass?: string
    stateClass?: string
    icon?: string
    attributes$?: Observable<EntityAttributes>
    device: DiscoveryDevice
}

export type SensorState = {
    id: string
    state: SensorValue
}

/**
 * https://www.home-assistant.io/integrations/sensor.mqtt/
 */
export default class Sensor {
    private discovery: Pick<Discovery, 'create$' | 'announce$'>
    private mqtt: Pick<Mqtt, 'publish$'>

    constructor(services: EntityServices) {
        this.discovery = services.discovery
        this.mqtt = services.mqtt
    }

    create$(state$: Observable<SensorValue>, id: string, options: SensorOptions): Observable<SensorState> {
        debug('asking for a sensor with id %s', id)

        const discovery$ = this.discovery
            .create$(id, 'sensor', { name: options.name, device: options.device })
            .pipe(shareReplay(1))

        return discovery$.pipe(
            switchMap((discovery) => {
                const announce$ = this.discovery.announce$(discovery, {
                    unit_of_measurement: options.unit,
                    device_class: options.deviceClass,
                    state_class: options.stateClass,
                    icon: options.icon
                })

                const attributes$ = options.attributes$
                    ? options.attributes$.pipe(
                        switchMap((attributes) => this.mqtt.publish$(discovery.topics.attributes, attributes, { qos: 1, retain: true }))
                    )
                    : EMPTY

                const states$ = state$.pipe(
                    distinctUntilChanged(),
                    switchMap((state) => {
                        debug('%s is now %s', id, state)
                        return concat(
                            this.mqtt.publish$(discovery.topics.state, String(state), { qos: 1, retain: true }),
                            of({ id, state })
                        )
                    })
                )

                return concat(announce$, merge(attributes$, states$))
            })
        )
    }
}
