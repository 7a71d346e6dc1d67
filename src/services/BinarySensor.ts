import DEBUG from 'debug'
import { concat, EMPTY, merge, Observable, of } from 'rxjs'
import { distinctUntilChanged, shareReplay, switchMap } from 'rxjs/operators'
import type { EntityAttributes } from '../types'
import Discovery, { DiscoveryDevice } from './Discovery'
import Mqtt from './Mqtt'
const debug = DEBUG('ev-tracker.binary-sensor')

export type EntityServices = {
    discovery: Pick<Discovery, 'create$' | 'announce$'>
    mqtt: Pick<Mqtt, 'publish$'>
}

export type BinarySensorOptions = {
    name?: string
    deviceClass?: string
    icon?: string
    attributes$?: Observable<EntityAttributes>
    device: DiscoveryDevice
}

export type BinarySensorState = {
    id: string
    state: boolean
}

/**
 * https://www.home-assistant.io/integrations/binary_sensor.mqtt/
 *
 * It exposes something which is either on or off.
 * Which is controlled by us. No external party can turn it on or off.
 */
export default class BinarySensor {
    private discovery: Pick<Discovery, 'create$' | 'announce$'>
    private mqtt: Pick<Mqtt, 'publish$'>

    constructor(services: EntityServices) {
        this.discovery = services.discovery
        this.mqtt = services.mqtt
    }

    /**
     * Announces the sensor and publishes every value of state$ to it.
     * Nothing is published until the result is subscribed.
     */
    create$(state$: Observable<boolean>, id: string, options: BinarySensorOptions): Observable<BinarySensorState> {
        debug('asking for a binary sensor with id %s', id)

        const discovery$ = this.discovery
            .create$(id, 'binary_sensor', { name: options.name, device: options.device })
            .pipe(shareReplay(1))

        return discovery$.pipe(
            switchMap((discovery) => {
                const announce$ = this.discovery.announce$(discovery, {
                    device_class: options.deviceClass,
                    icon: options.icon,
                    payload_on: 'ON',
                    payload_off: 'OFF'
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
                            this.mqtt.publish$(discovery.topics.state, state ? 'ON' : 'OFF', { qos: 1, retain: true }),
                            of({ id, state })
                        )
                    })
                )

                return concat(announce$, merge(attributes$, states$))
            })
        )
    }
}
